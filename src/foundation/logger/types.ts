// types.ts: ロガー関連の共通型契約を集約する。
import type { Logger } from "winston";

/**
 * CLI 用ロガーの生成時に提供するパラメータ。
 */
export interface CliLoggerParams {
  /** ログ行の先頭に付与するラベル。 */
  label: string;
  /** デバッグレベルの詳細ログを有効化する場合は true。 */
  debug: boolean;
}

/**
 * CLI 層およびパイプライン層が利用するロガーの契約。
 */
export type CliLogger = Logger;
