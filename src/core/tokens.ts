/**
 * コマンドライン引数 1 要素ごとの分類判定をまとめたモジュール。
 * 各判定は純粋関数で、parsers.ts の走査処理から参照される。
 */

/** POSIX の「オプション終端」を表すトークン。 */
export const DOUBLE_HYPHEN = "--";

/** 標準入出力を表すプレースホルダ。オプションとしては扱わない。 */
export const SINGLE_HYPHEN = "-";

/** 定義オプションの名前と値を区切る文字。 */
export const DEFINITION_SEPARATOR = "=";

/** 定義オプションを名前と値へ分割した結果。 */
export interface DefinitionParts {
  option: string;
  definition: string;
}

export function isDoubleHyphen(token: string): boolean {
  return token === DOUBLE_HYPHEN;
}

export function isSingleHyphen(token: string): boolean {
  return token === SINGLE_HYPHEN;
}

/**
 * `-` で始まり、`-` 単体でも `--` 単体でもないトークンをオプションとみなす。
 */
export function isOptionToken(token: string): boolean {
  return token.startsWith("-") && !isSingleHyphen(token) && !isDoubleHyphen(token);
}

/** 先頭のハイフンがちょうど 1 つのオプション。 */
export function isShortOption(token: string): boolean {
  return isOptionToken(token) && !token.startsWith("--");
}

/** 先頭のハイフンがちょうど 2 つのオプション。 */
export function isLongOption(token: string): boolean {
  return isOptionToken(token) && token.startsWith("--") && !token.startsWith("---");
}

/**
 * `=` を含むかどうかのみで定義オプションかを判定する。
 * getDefinitionParts を呼ぶ前の前提確認に使う。
 */
export function isDefinitionOption(token: string): boolean {
  return token.includes(DEFINITION_SEPARATOR);
}

/**
 * `-abc` のようにハイフン 1 つの後ろへ 2 文字以上続くショートオプションかを判定する。
 */
export function isMopsOption(token: string): boolean {
  return isShortOption(token) && codePoints(token).length > 2;
}

/**
 * 定義オプションを最初の `=` で名前と値に分割する。
 * 2 つ目以降の `=` は値の一部として残る。
 *
 * @throws {Error} `=` を含まない文字列が渡された場合。
 */
export function getDefinitionParts(token: string): DefinitionParts {
  const separatorIndex = token.indexOf(DEFINITION_SEPARATOR);
  if (separatorIndex < 0) {
    throw new Error(`Definition option must contain '=': ${token}`);
  }
  return {
    option: token.slice(0, separatorIndex),
    definition: token.slice(separatorIndex + DEFINITION_SEPARATOR.length),
  };
}

/**
 * ショートオプションの各文字を独立した `-<char>` へ展開する。
 * コードポイント単位で分割するが、ASCII のオプション文字を前提とする。
 */
export function expandShortOption(token: string): string[] {
  return codePoints(token)
    .slice(1)
    .map((char) => `-${char}`);
}

function codePoints(value: string): string[] {
  return Array.from(value);
}
