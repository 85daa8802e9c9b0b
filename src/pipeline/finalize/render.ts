/**
 * @file Command ビューを人間向けテキストまたは JSON へ整形する。
 */
import type { Command } from "../../core/command.js";
import type { OutputFormat } from "../../types.js";

const NONE = "(none)";

function formatList(values: readonly string[] | undefined): string {
  return values === undefined || values.length === 0 ? NONE : values.join(" ");
}

function formatOptional(value: string | undefined): string {
  return value ?? NONE;
}

/**
 * 先頭行に `Command: '...'`、以降に各フィールドを `key: value` 形式で並べる。
 */
export function renderText(command: Command): string {
  const definitions = [...command.definitions].map(([name, value]) => `${name}=${value}`);
  return [
    command.toString(),
    `argc: ${command.argc}`,
    `executable: ${command.executable}`,
    `options: ${formatList(command.options)}`,
    `definitions: ${formatList(definitions)}`,
    `first_arg: ${formatOptional(command.firstArg)}`,
    `last_arg: ${formatOptional(command.lastArg)}`,
    `double_hyphen_argv: ${formatList(command.doubleHyphenArgv)}`,
    `mops: ${formatList(command.mops)}`,
    `last_option_index: ${command.lastOptionIndex}`,
  ].join("\n");
}

export function renderJson(command: Command): string {
  return JSON.stringify(command.toSnapshot(), null, 2);
}

export function renderCommand(command: Command, format: OutputFormat): string {
  switch (format) {
    case "text":
      return renderText(command);
    case "json":
      return renderJson(command);
  }
}
