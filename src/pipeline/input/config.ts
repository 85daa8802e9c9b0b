/**
 * CLI 起動時に利用する環境ロードと既定値解決を担うモジュール。
 */
import { ZodError } from "zod";
import type { CliDefaults, ConfigEnvironment } from "../../types.js";
import { envConfigSchema, type EnvConfig } from "../../foundation/env.js";
import { ROOT_DIR } from "../../foundation/paths.js";
import type { ConfigEnvInitOptions } from "./config-env.js";
import { ConfigEnv } from "./config-env.js";

/**
 * リポジトリ直下の`.env`を読み込み、必要に応じて`.env.{suffix}`で上書きする。
 *
 * @param options.envSuffix 追加環境ファイルの接尾辞。
 * @param options.baseDir   ルートディレクトリをテストなどで上書きする場合に指定。
 */
export async function loadEnvironment(options: ConfigEnvInitOptions = {}): Promise<ConfigEnv> {
  const baseDir = options.baseDir ?? ROOT_DIR;
  return ConfigEnv.create({ ...options, baseDir });
}

/**
 * 環境変数や既定値からCLIで使用するデフォルト設定を読み込む。
 *
 * @throws {Error} 設定値が不正な場合は最初の検証エラーのメッセージで失敗する。
 */
export function loadDefaults(configEnv: ConfigEnvironment): CliDefaults {
  const envEntries = Object.fromEntries(configEnv.entries());
  let envConfig: EnvConfig;
  try {
    envConfig = envConfigSchema.parse(envEntries);
  } catch (error) {
    if (error instanceof ZodError) {
      const firstIssue = error.issues[0];
      if (firstIssue?.message) {
        throw new Error(firstIssue.message);
      }
    }
    throw error;
  }

  return {
    format: envConfig.ARGV_VIEW_FORMAT ?? "text",
    debug: envConfig.ARGV_VIEW_DEBUG ?? false,
  };
}
