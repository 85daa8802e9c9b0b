/**
 * CLI 実行時に利用する環境変数の読み込み契約と実装を定義するモジュール。
 * `.env` 系ファイルを解決し、既知キーのみを内部状態として保持する。
 */
import fs from "node:fs/promises";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { ROOT_DIR } from "../../foundation/paths.js";
import type { ConfigEnvironment } from "../../types.js";

/**
 * ConfigEnv が認識する環境変数のスキーマ。
 * アプリケーション層で参照されるキーのみを列挙し、未知のキーは除外する。
 */
export const configEnvSchema = z
  .object({
    /** `~` 展開に使うため、未設定時は OS のホームディレクトリへフォールバックする。 */
    HOME: z.string().optional(),
    /** 出力形式の既定値。未設定なら text。 */
    ARGV_VIEW_FORMAT: z.string().optional(),
    /** デバッグログの既定値。未設定なら無効。 */
    ARGV_VIEW_DEBUG: z.string().optional(),
  })
  .strip();

/** ConfigEnv が取り扱う環境変数名のユニオン。 */
export type ConfigEnvKey = keyof z.infer<typeof configEnvSchema>;

/** ConfigEnv が認識するキー一覧。 */
export const CONFIG_ENV_KNOWN_KEYS: readonly ConfigEnvKey[] = configEnvSchema.keyof().options;

const KNOWN_KEY_SET: ReadonlySet<string> = new Set(CONFIG_ENV_KNOWN_KEYS);

/** 文字列が ConfigEnv の既知キーかを判定する。 */
export function isConfigEnvKey(key: string): key is ConfigEnvKey {
  return KNOWN_KEY_SET.has(key);
}

/** `.env` 群の読み込み挙動を調整する初期化オプション。 */
export interface ConfigEnvInitOptions {
  /**
   * `.env.{suffix}` を追加で適用するための接尾辞。
   * 追加ファイルを使わない運用もあるため optional 指定。
   */
  readonly envSuffix?: string;
  /**
   * デフォルトではリポジトリルートを探索対象とするが、テストで仮想ディレクトリを
   * 指定できるようにするためのルートパス。
   */
  readonly baseDir?: string;
}

/**
 * `.env` 群から読み込んだ環境変数を内部に保持し、参照専用で提供する実装。
 * インスタンス生成時にすべてのファイルを読み込み、以降は不変とする。
 */
export class ConfigEnv implements ConfigEnvironment {
  /** 設定値を保持する Map。 */
  private readonly values: Map<ConfigEnvKey, string>;

  private constructor(values: Map<ConfigEnvKey, string>) {
    this.values = values;
  }

  /**
   * `.env` ファイル群を読み込んで ConfigEnv インスタンスを生成する。
   * process.env の値が最優先で、`.env.{suffix}` は `.env` 由来の値のみを上書きする。
   *
   * @param options 読み込み挙動を制御するためのオプション。
   */
  static async create(options: ConfigEnvInitOptions = {}): Promise<ConfigEnv> {
    const baseDir = options.baseDir ?? ROOT_DIR;
    const initialValues = new Map<ConfigEnvKey, string>();
    for (const [key, value] of Object.entries(process.env)) {
      if (typeof value === "string" && isConfigEnvKey(key)) {
        initialValues.set(key, value);
      }
    }
    const resolvedValues = new Map(initialValues);

    const baseEntries = await parseEnvFile(path.join(baseDir, ".env"));
    const baseValueMap = new Map<ConfigEnvKey, string>(baseEntries ?? []);
    for (const [key, value] of baseEntries ?? []) {
      if (!initialValues.has(key)) {
        resolvedValues.set(key, value);
      }
    }

    const suffix = options.envSuffix?.trim();
    if (suffix && suffix.length > 0) {
      const overrideEntries = await parseEnvFile(path.join(baseDir, `.env.${suffix}`));
      for (const [key, value] of overrideEntries ?? []) {
        if (!initialValues.has(key)) {
          resolvedValues.set(key, value);
          continue;
        }
        const baseValue = baseValueMap.get(key);
        if (baseValue !== undefined && initialValues.get(key) === baseValue) {
          resolvedValues.set(key, value);
        }
      }
    }

    return new ConfigEnv(resolvedValues);
  }

  get(key: ConfigEnvKey): string | undefined {
    return this.values.get(key);
  }

  has(key: ConfigEnvKey): boolean {
    return this.values.has(key);
  }

  entries(): IterableIterator<readonly [key: ConfigEnvKey, value: string]> {
    return this.values.entries();
  }
}

/**
 * 指定されたファイルパスに存在する `.env` ファイルを解析し、既知キーのエントリのみを返す。
 *
 * @returns ファイルが存在しない場合は null。
 */
async function parseEnvFile(
  filePath: string,
): Promise<ReadonlyArray<[key: ConfigEnvKey, value: string]> | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isFileNotFoundError(error)) {
      return null;
    }
    throw error;
  }
  const entries: Array<[ConfigEnvKey, string]> = [];
  for (const [key, value] of Object.entries(dotenv.parse(content))) {
    if (isConfigEnvKey(key)) {
      entries.push([key, value]);
    }
  }
  return entries;
}

/**
 * ENOENT などファイルが存在しない場合に発生するエラーかどうかを判定する。
 */
function isFileNotFoundError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
