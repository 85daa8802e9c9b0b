/**
 * argv-view: `--` の後ろに渡された引数列を Command ビューへ分類して表示する CLI。
 */
import { Command as Program, CommanderError, InvalidArgumentError } from "commander";
import { Command } from "../core/command.js";
import { isOutputFormat } from "../foundation/env.js";
import { createCliLogger, updateCliLoggerLevel } from "../foundation/logger/create-cli-logger.js";
import { writeOutput } from "../pipeline/finalize/io.js";
import { renderCommand } from "../pipeline/finalize/render.js";
import { loadDefaults, loadEnvironment } from "../pipeline/input/config.js";
import type { CliDefaults, OutputFormat } from "../types.js";
import type { InspectCliOptions, InspectDependencies, InspectOutput } from "./types.js";

const LOG_LABEL = "argv-view";
const HELP_FLAGS = "-?, --help";
const HELP_DESCRIPTION = "ヘルプを表示します";
const FORMAT_ERROR_MESSAGE = "Error: --format には text または json を指定してください";
const MISSING_ARGV_MESSAGE =
  "Error: 解析する引数列を指定してください (例: argv-view -- app -abc --opt=val)";

function parseFormatFlag(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  if (!isOutputFormat(normalized)) {
    throw new InvalidArgumentError(FORMAT_ERROR_MESSAGE);
  }
  return normalized;
}

/**
 * 検査 CLI の commander プログラムを構築する。
 *
 * @param defaults `.env` から解決した既定値。
 * @param output ヘルプの出力先。
 */
export function buildInspectProgram(defaults: CliDefaults, output: InspectOutput): Program {
  const program = new Program();
  program
    .name(LOG_LABEL)
    .description("コマンドライン引数列をオプション・定義・位置引数へ分類して表示します")
    .exitOverride()
    .allowUnknownOption(false)
    .showSuggestionAfterError(false)
    .passThroughOptions()
    .configureOutput({
      writeOut: output.writeOut,
      // エラー内容は runInspect がロガー経由で出力する。
      outputError: () => undefined,
    })
    .helpOption(HELP_FLAGS, HELP_DESCRIPTION)
    .option("-f, --format <format>", "出力形式 (text/json)", parseFormatFlag, defaults.format)
    .option("-o, --output <path>", "結果を保存するファイルパスを指定します")
    .option("--debug", "デバッグログを有効化します")
    .argument("[argv...]", "解析対象の引数列。先頭は実行ファイルパス");
  return program;
}

/**
 * 引数を解析し、既定値と統合した CLI オプションを返す。
 *
 * @throws {Error} 未知のフラグや不正な値、解析対象の引数列が空の場合。
 */
export function parseInspectOptions(
  argv: string[],
  defaults: CliDefaults,
  program: Program,
): InspectCliOptions {
  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === "commander.helpDisplayed") {
        return {
          format: defaults.format,
          outputPath: undefined,
          debug: defaults.debug,
          argv: [],
          helpRequested: true,
        };
      }
      throw new Error(error.message);
    }
    throw error;
  }

  const opts = program.opts<{ format: OutputFormat; output?: string; debug?: boolean }>();
  const targetArgv = [...program.args];
  if (targetArgv.length === 0) {
    throw new Error(MISSING_ARGV_MESSAGE);
  }
  const outputPath = opts.output?.trim();

  return {
    format: opts.format,
    outputPath: outputPath && outputPath.length > 0 ? outputPath : undefined,
    debug: defaults.debug || Boolean(opts.debug),
    argv: targetArgv,
    helpRequested: false,
  };
}

/**
 * CLI 全体を実行し、終了コードを返す。
 */
export async function runInspect(argv: string[], deps: InspectDependencies): Promise<number> {
  const logger = deps.logger ?? createCliLogger({ label: LOG_LABEL, debug: false });
  try {
    const configEnv = await loadEnvironment(deps.configEnvOptions);
    const defaults = loadDefaults(configEnv);
    const options = parseInspectOptions(argv, defaults, buildInspectProgram(defaults, deps));
    if (options.helpRequested) {
      return 0;
    }
    if (options.debug) {
      updateCliLoggerLevel(logger, "debug");
    }

    const command = new Command(options.argv);
    logger.debug("classified", {
      options: command.options,
      definitions: Object.fromEntries(command.definitions),
      doubleHyphenArgv: command.doubleHyphenArgv,
      lastOptionIndex: command.lastOptionIndex,
    });

    const rendered = renderCommand(command, options.format);
    if (options.outputPath === undefined) {
      deps.writeOut(`${rendered}\n`);
      return 0;
    }
    const saved = await writeOutput({
      content: `${rendered}\n`,
      filePath: options.outputPath,
      cwd: deps.cwd,
      configEnv,
    });
    logger.info(`saved: ${saved.absolutePath} (${saved.bytesWritten} bytes)`);
    return 0;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

/**
 * プロセス引数から CLI を起動し、終了コードを process.exitCode に設定する。
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  process.exitCode = await runInspect(argv, {
    writeOut: (text) => {
      process.stdout.write(text);
    },
  });
}
