/**
 * 引数列全体を走査して分類結果を 1 つずつ生成する関数群。
 * argv[0] は実行ファイルパスとして扱い、分類対象は添字 1 以降に限る。
 */
import {
  DOUBLE_HYPHEN,
  expandShortOption,
  getDefinitionParts,
  isDefinitionOption,
  isDoubleHyphen,
  isOptionToken,
  isShortOption,
} from "./tokens.js";

const FIRST_ARGUMENT_INDEX = 1;

/**
 * `--` より前にある引数を添字付きで列挙する。
 */
function* argumentsBeforeDoubleHyphen(
  argv: readonly string[],
): Generator<readonly [index: number, token: string]> {
  for (let index = FIRST_ARGUMENT_INDEX; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === undefined || isDoubleHyphen(token)) {
      return;
    }
    yield [index, token];
  }
}

/**
 * オプション名を出現順に抽出する。定義オプションは名前部分のみを返す。
 *
 * @param argv 実行ファイルパスを先頭に含む引数列。
 */
export function parseOptions(argv: readonly string[]): string[] {
  const options: string[] = [];
  for (const [, token] of argumentsBeforeDoubleHyphen(argv)) {
    if (!isOptionToken(token)) {
      continue;
    }
    options.push(isDefinitionOption(token) ? getDefinitionParts(token).option : token);
  }
  return options;
}

/**
 * `--opt=value` 形式の定義オプションを名前から値への Map にまとめる。
 * 同じ名前が再登場した場合は後の値で上書きする。
 */
export function parseDefinitions(argv: readonly string[]): Map<string, string> {
  const definitions = new Map<string, string>();
  for (const [, token] of argumentsBeforeDoubleHyphen(argv)) {
    if (!isOptionToken(token) || !isDefinitionOption(token)) {
      continue;
    }
    const { option, definition } = getDefinitionParts(token);
    definitions.set(option, definition);
  }
  return definitions;
}

/** 実行ファイルパス直後の引数。引数が無い場合は undefined。 */
export function parseFirstArg(argv: readonly string[]): string | undefined {
  return argv.length > FIRST_ARGUMENT_INDEX ? argv[FIRST_ARGUMENT_INDEX] : undefined;
}

/** 末尾の引数。実行ファイルパスしか無い場合は undefined。 */
export function parseLastArg(argv: readonly string[]): string | undefined {
  return argv.length > FIRST_ARGUMENT_INDEX ? argv[argv.length - 1] : undefined;
}

/**
 * 最初の `--` より後ろの引数を解釈せずにそのまま返す。
 *
 * @returns `--` が無い、もしくは後続が空の場合は undefined。
 */
export function parseDoubleHyphenArgs(argv: readonly string[]): string[] | undefined {
  const sentinelIndex = argv.indexOf(DOUBLE_HYPHEN, FIRST_ARGUMENT_INDEX);
  if (sentinelIndex < 0) {
    return undefined;
  }
  const trailing = argv.slice(sentinelIndex + 1);
  return trailing.length > 0 ? trailing : undefined;
}

/**
 * 抽出済みオプション列からショートオプションを 1 文字ずつの `-<char>` へ展開する。
 * parseOptions の結果を入力とするため、`--` 以降は自然に対象外となる。
 *
 * @param options parseOptions が返したオプション名の列。
 * @returns ショートオプションが 1 つも無い場合は undefined。
 */
export function parseMops(options: readonly string[]): string[] | undefined {
  const expanded: string[] = [];
  for (const option of options) {
    if (!isShortOption(option)) {
      continue;
    }
    expanded.push(...expandShortOption(option));
  }
  return expanded.length > 0 ? expanded : undefined;
}

/**
 * `--` より前で最も右にあるオプションの argv 添字を返す。オプションが無ければ 0。
 */
export function parseLastOptionIndex(argv: readonly string[]): number {
  let lastIndex = 0;
  for (const [index, token] of argumentsBeforeDoubleHyphen(argv)) {
    if (isOptionToken(token)) {
      lastIndex = index;
    }
  }
  return lastIndex;
}
