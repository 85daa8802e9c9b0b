/**
 * src/cli/types.ts
 * 検査 CLI の解析結果と実行時依存性に関する型定義群。
 */
import type { CliLogger } from "../foundation/logger/types.js";
import type { ConfigEnvInitOptions } from "../pipeline/input/config-env.js";
import type { OutputFormat } from "../types.js";

/**
 * CLI フラグの解析結果。
 */
export interface InspectCliOptions {
  /** 解析結果の出力形式。 */
  format: OutputFormat;
  /** 結果を保存するファイルパス。未指定なら標準出力へ書き出す。 */
  outputPath: string | undefined;
  /** デバッグログを有効化するとき true。 */
  debug: boolean;
  /** 解析対象の引数列。先頭は実行ファイルパスとして扱う。 */
  argv: string[];
  /** ヘルプを表示して終了した場合は true。 */
  helpRequested: boolean;
}

/**
 * commander のヘルプ出力先。テストで差し替えられるよう外部から注入する。
 */
export interface InspectOutput {
  writeOut: (text: string) => void;
}

/**
 * runInspect が利用する実行時依存性。
 */
export interface InspectDependencies extends InspectOutput {
  /** 既定では createCliLogger で生成する。 */
  logger?: CliLogger;
  /** ConfigEnv 初期化挙動を上書きするためのオプション。 */
  configEnvOptions?: ConfigEnvInitOptions;
  /** `--output` の相対パスの基準。既定は process.cwd()。 */
  cwd?: string;
}
