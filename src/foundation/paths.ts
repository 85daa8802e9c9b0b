/**
 * オプション値として渡されたパス文字列を扱うユーティリティ。
 * CLI やパイプライン各層から参照される基盤機能をまとめる。
 */
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ConfigEnvironment } from "../types.js";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

/** リポジトリのルートディレクトリ絶対パス。 */
export const ROOT_DIR = path.resolve(moduleDir, "../..");

/**
 * 親ディレクトリを返す。ファイル名のみの場合は空文字。
 *
 * @returns 空文字やルートそのものを渡した場合は undefined。
 */
export function parentOf(target: string): string | undefined {
  if (target.length === 0 || path.parse(target).root === target) {
    return undefined;
  }
  const parent = path.dirname(target);
  if (parent === "." && !target.startsWith(`.${path.sep}`)) {
    return "";
  }
  return parent;
}

/**
 * 末尾のパス要素を fileName に置き換える。
 * 末尾が `..` やルートのように置き換えるファイル名を持たない場合は末尾へ追加する。
 */
export function withFileName(target: string, fileName: string): string {
  const baseName = path.basename(target);
  if (baseName === "" || baseName === "..") {
    return path.join(target, fileName);
  }
  return path.join(path.dirname(target), fileName);
}

/**
 * `~` から始まるパスを HOME 環境変数を基に展開する。
 *
 * @param target 変換対象のパス。
 * @param configEnv ConfigEnv から供給される環境値。
 * @returns 展開後のパス。
 */
export function expandHome(target: string, configEnv: ConfigEnvironment): string {
  if (!target.startsWith("~")) {
    return target;
  }
  const homeFromConfig = configEnv.get("HOME");
  const homeDirectory =
    typeof homeFromConfig === "string" && homeFromConfig.trim().length > 0
      ? homeFromConfig.trim()
      : os.homedir().trim();
  if (homeDirectory.length === 0) {
    throw new Error("HOME environment variable is required when using '~' paths.");
  }
  return path.join(path.resolve(homeDirectory), target.slice(1));
}
