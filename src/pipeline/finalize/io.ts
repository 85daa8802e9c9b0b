/**
 * @file 整形済みの解析結果を標準出力以外の出力先へ書き出すユーティリティ。
 */
import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { expandHome } from "../../foundation/paths.js";
import type { ConfigEnvironment } from "../../types.js";

export interface WriteOutputParams {
  /** 書き出す本文。 */
  content: string;
  /** `--output` で指定された相対または絶対パス。`~` 始まりも受け付ける。 */
  filePath: string;
  /**
   * 相対パスの基準ディレクトリ。
   * `undefined` を渡した場合は `process.cwd()` を利用する。
   */
  cwd: string | undefined;
  /** `~` 展開に使う環境スナップショット。 */
  configEnv: ConfigEnvironment;
}

export interface WriteOutputResult {
  /** 書き込み先の絶対パス。 */
  absolutePath: string;
  /** 書き込んだバイト数。 */
  bytesWritten: number;
}

/**
 * 出力パスを絶対パスへ解決する。
 *
 * @throws {Error} 空のパスが指定された場合。
 */
export function resolveOutputPath(
  rawPath: string,
  cwd: string,
  configEnv: ConfigEnvironment,
): string {
  const trimmed = rawPath.trim();
  if (trimmed.length === 0) {
    throw new Error("Error: --output には空でないパスを指定してください");
  }
  return path.resolve(cwd, expandHome(trimmed, configEnv));
}

async function statIfExists(target: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

/**
 * 本文を UTF-8 でファイルへ書き出す。親ディレクトリは必要に応じて作成する。
 *
 * @throws {Error} 出力先が既存のディレクトリだった場合。
 */
export async function writeOutput(params: WriteOutputParams): Promise<WriteOutputResult> {
  const cwd = params.cwd ?? process.cwd();
  const absolutePath = resolveOutputPath(params.filePath, cwd, params.configEnv);
  const stats = await statIfExists(absolutePath);
  if (stats?.isDirectory()) {
    throw new Error(`Error: 出力先としてディレクトリは指定できません: ${absolutePath}`);
  }
  await fs.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.writeFile(absolutePath, params.content, { encoding: "utf8" });
  return { absolutePath, bytesWritten: Buffer.byteLength(params.content, "utf8") };
}
