// create-cli-logger.ts: CLI 向け Winston ロガー生成ヘルパー。
import type { TransformableInfo } from "logform";
import { createLogger, format, transports } from "winston";
import type { CliLogger, CliLoggerParams } from "./types.js";

const MESSAGE_SYMBOL = Symbol.for("message");
const LEVEL_SYMBOL = Symbol.for("level");
const SPLAT_SYMBOL = Symbol.for("splat");
const FORMAT_KEYS = new Set(["message", "level", "timestamp", "label"]);

// BigInt を含むメタデータでも JSON.stringify が失敗しないよう文字列へ変換する。
const JSON_REPLACER = (_key: string, value: unknown) =>
  typeof value === "bigint" ? value.toString() : value;

/**
 * CLI 専用ロガーを生成する。出力はすべて標準エラーへ送り、標準出力は結果表示に残す。
 *
 * @param params 表示ラベルとログレベル設定。
 */
export function createCliLogger(params: CliLoggerParams): CliLogger {
  const level = params.debug ? "debug" : "info";

  return createLogger({
    level,
    format: format.combine(
      format.errors({ stack: true }),
      format.splat(),
      format.label({ label: params.label }),
      format.timestamp(),
      format.printf((entry) => formatConsoleLine(entry)),
    ),
    transports: [
      new transports.Console({
        level,
        stderrLevels: ["error", "warn", "info", "debug"],
      }),
    ],
  });
}

/**
 * CLI ロガー本体と全トランスポートのログレベルを同時に更新する。
 * Winston の level 変更はトランスポートへ伝播しないため、個別に設定する。
 */
export function updateCliLoggerLevel(logger: CliLogger, level: string): void {
  logger.level = level;
  for (const transport of logger.transports) {
    transport.level = level;
  }
}

function formatConsoleLine(
  info: TransformableInfo & { label?: string; timestamp?: string },
): string {
  if (info.label === undefined || info.timestamp === undefined) {
    throw new Error("Logger format requires label and timestamp metadata.");
  }
  const label = info.label.startsWith("[") ? info.label : `[${info.label}]`;
  const line = `${label} ${info.timestamp} ${info.level}: ${coerceMessage(info)}`;
  const metadata = extractMetadata(info);
  return metadata === undefined ? line : `${line} ${metadata}`;
}

function coerceMessage(info: TransformableInfo): string {
  const message = info[MESSAGE_SYMBOL];
  if (typeof message === "string") {
    return message;
  }
  return typeof info.message === "string" ? info.message : JSON.stringify(info.message);
}

/** Winston が付与する内部フィールドを除いた追加メタデータを JSON 化する。 */
function extractMetadata(info: TransformableInfo): string | undefined {
  const splat = info[SPLAT_SYMBOL];
  const splatLength = Array.isArray(splat) ? splat.length : 0;
  const metadata: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(info)) {
    if (FORMAT_KEYS.has(key)) {
      continue;
    }
    // format.splat() が配列展開した要素の numeric キーは splat として別にまとめる。
    if (/^[0-9]+$/u.test(key) && Number.parseInt(key, 10) < splatLength) {
      continue;
    }
    metadata[key] = value;
  }
  for (const symbolKey of Object.getOwnPropertySymbols(info)) {
    if (symbolKey === MESSAGE_SYMBOL || symbolKey === LEVEL_SYMBOL || symbolKey === SPLAT_SYMBOL) {
      continue;
    }
    metadata[String(symbolKey)] = info[symbolKey];
  }
  if (Array.isArray(splat) && splat.length > 0) {
    metadata.splat = splat;
  }

  return Object.keys(metadata).length === 0 ? undefined : JSON.stringify(metadata, JSON_REPLACER);
}
