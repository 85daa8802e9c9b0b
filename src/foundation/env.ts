/**
 * 環境変数関連の共通スキーマを提供するモジュール。
 * Input 層の既定値解決から参照される検証ロジックをここに集約する。
 */
import { z } from "zod";
import type { OutputFormat } from "../types.js";

const formatValues: readonly OutputFormat[] = ["text", "json"];
const truthyValues = ["1", "true", "yes", "on"];
const falsyValues = ["", "0", "false", "no", "off"];

const formatMessage = 'ARGV_VIEW_FORMAT must be one of "text" or "json".';
const debugMessage = "ARGV_VIEW_DEBUG must be one of 1/0, true/false, yes/no, on/off.";

/** 文字列が出力形式として有効かを判定する。 */
export function isOutputFormat(value: string): value is OutputFormat {
  return formatValues.some((format) => format === value);
}

/** 出力形式を検証・正規化するスキーマ。 */
export const outputFormatSchema = z
  .string()
  .transform((value, ctx): OutputFormat => {
    const normalized = value.trim().toLowerCase();
    if (!isOutputFormat(normalized)) {
      ctx.addIssue({ code: "custom", message: `${formatMessage} Received: ${value}` });
      return z.NEVER;
    }
    return normalized;
  });

/** 真偽値フラグを検証・正規化するスキーマ。 */
export const booleanFlagSchema = z.string().transform((value, ctx): boolean => {
  const normalized = value.trim().toLowerCase();
  if (truthyValues.includes(normalized)) {
    return true;
  }
  if (!falsyValues.includes(normalized)) {
    ctx.addIssue({ code: "custom", message: `${debugMessage} Received: ${value}` });
    return z.NEVER;
  }
  return false;
});

/** `.env` と環境変数から読み取る設定値を検証するスキーマ。 */
export const envConfigSchema = z
  .object({
    ARGV_VIEW_FORMAT: outputFormatSchema.optional(),
    ARGV_VIEW_DEBUG: booleanFlagSchema.optional(),
  })
  .passthrough();

export type EnvConfig = z.infer<typeof envConfigSchema>;
