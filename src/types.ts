import type { ConfigEnvKey } from "./pipeline/input/config-env.js";

/** 解析結果の出力形式。 */
export type OutputFormat = "text" | "json";

/** CLI が参照する既定値セット。 */
export interface CliDefaults {
  format: OutputFormat;
  debug: boolean;
}

/**
 * `.env` 読み込み後の設定値へ不変アクセスするための契約。
 */
export interface ConfigEnvironment {
  /**
   * 指定した環境キーに紐づく値を取得する。
   *
   * @param key 参照対象の環境変数名。ConfigEnv が認識しているキーのみ指定できる。
   * @returns キーが存在する場合は値、存在しない場合は undefined。
   */
  get(key: ConfigEnvKey): string | undefined;

  /**
   * 指定した環境キーが保持されているか判定する。
   *
   * @param key 存在確認を行う環境変数名。ConfigEnv が認識しているキーのみ指定できる。
   */
  has(key: ConfigEnvKey): boolean;

  /**
   * 保持している全てのキーと値を列挙する。
   */
  entries(): IterableIterator<readonly [key: ConfigEnvKey, value: string]>;
}

/**
 * Command ビューを JSON 化した際の形。
 * 値が存在しないフィールドは null で表す。
 */
export interface CommandSnapshot {
  argv: string[];
  argc: number;
  executable: string;
  options: string[];
  definitions: Record<string, string>;
  firstArg: string | null;
  lastArg: string | null;
  doubleHyphenArgv: string[] | null;
  mops: string[] | null;
  lastOptionIndex: number;
}
