/**
 * 引数列から一度だけ構築される不変の Command ビュー。
 * 構築時に parsers.ts の分類関数をすべて実行し、以降の問い合わせは保持済みフィールドのみを参照する。
 */
import type { CommandSnapshot } from "../types.js";
import {
  parseDefinitions,
  parseDoubleHyphenArgs,
  parseFirstArg,
  parseLastArg,
  parseLastOptionIndex,
  parseMops,
  parseOptions,
} from "./parsers.js";

const HELP_OPTIONS = ["-h", "--help"] as const;
const VERSION_OPTIONS = ["-v", "--version"] as const;
const USAGE_OPTIONS = ["--usage"] as const;

export class Command {
  /** 実行ファイルパスを先頭に含む引数列。 */
  readonly argv: readonly string[];
  /** argv の要素数。 */
  readonly argc: number;
  /** argv[0]。 */
  readonly executable: string;
  /** `--` より前に現れたオプション名。定義オプションは名前部分のみ。 */
  readonly options: readonly string[];
  readonly #definitions: Map<string, string>;
  readonly firstArg: string | undefined;
  readonly lastArg: string | undefined;
  /** 最初の `--` より後ろの引数。後続が無い場合は undefined。 */
  readonly doubleHyphenArgv: readonly string[] | undefined;
  /** ショートオプションを 1 文字ずつ展開した列。ショートオプションが無い場合は undefined。 */
  readonly mops: readonly string[] | undefined;
  /** `--` より前で最も右にあるオプションの添字。無ければ 0。 */
  readonly lastOptionIndex: number;

  /**
   * @param argv 実行ファイルパスを先頭に含む引数列。呼び出し側の配列は複製して保持する。
   * @throws {Error} 空の引数列が渡された場合。
   */
  constructor(argv: readonly string[]) {
    const [executable] = argv;
    if (executable === undefined) {
      throw new Error("Command requires at least the executable path.");
    }
    this.argv = Object.freeze([...argv]);
    this.argc = this.argv.length;
    this.executable = executable;

    const options = parseOptions(this.argv);
    this.options = Object.freeze(options);
    this.#definitions = parseDefinitions(this.argv);
    this.firstArg = parseFirstArg(this.argv);
    this.lastArg = parseLastArg(this.argv);
    this.doubleHyphenArgv = freezeOptional(parseDoubleHyphenArgs(this.argv));
    this.mops = freezeOptional(parseMops(options));
    this.lastOptionIndex = parseLastOptionIndex(this.argv);
    Object.freeze(this);
  }

  /**
   * `--` より前に現れた `name=value` 形式の定義。
   * 呼び出しごとに複製を返すため、戻り値を変更してもビューには影響しない。
   */
  get definitions(): Map<string, string> {
    return new Map(this.#definitions);
  }

  hasArgs(): boolean {
    return this.argc > 1;
  }

  hasDefinitions(): boolean {
    return this.#definitions.size > 0;
  }

  hasOptions(): boolean {
    return this.options.length > 0;
  }

  hasMops(): boolean {
    return this.mops !== undefined;
  }

  hasDoubleHyphenArgs(): boolean {
    return this.doubleHyphenArgv !== undefined;
  }

  /** 実行ファイルパスを除く引数に完全一致する要素があるか。 */
  containsArg(needle: string): boolean {
    return this.argv.indexOf(needle, 1) >= 0;
  }

  containsAllArgs(needles: readonly string[]): boolean {
    return needles.every((needle) => this.containsArg(needle));
  }

  containsAnyArg(needles: readonly string[]): boolean {
    return needles.some((needle) => this.containsArg(needle));
  }

  containsOption(needle: string): boolean {
    return this.options.includes(needle);
  }

  containsAllOptions(needles: readonly string[]): boolean {
    return needles.every((needle) => this.containsOption(needle));
  }

  containsAnyOption(needles: readonly string[]): boolean {
    return needles.some((needle) => this.containsOption(needle));
  }

  containsDefinition(needle: string): boolean {
    return this.#definitions.has(needle);
  }

  containsAllDefinitions(needles: readonly string[]): boolean {
    return needles.every((needle) => this.containsDefinition(needle));
  }

  containsAnyDefinition(needles: readonly string[]): boolean {
    return needles.some((needle) => this.containsDefinition(needle));
  }

  /** 展開済みショートオプションに含まれるか。ショートオプションが無ければ常に false。 */
  containsMops(needle: string): boolean {
    return this.mops?.includes(needle) ?? false;
  }

  /**
   * すべての needle が展開済みショートオプションに含まれるか。
   * ショートオプションが無い場合は needle を見ずに false を返す。
   */
  containsAllMops(needles: readonly string[]): boolean {
    const mops = this.mops;
    if (mops === undefined) {
      return false;
    }
    return needles.every((needle) => mops.includes(needle));
  }

  containsAnyMops(needles: readonly string[]): boolean {
    const mops = this.mops;
    if (mops === undefined) {
      return false;
    }
    return needles.some((needle) => mops.includes(needle));
  }

  /**
   * argv[1] から順に needles と隙間なく一致するかを判定する。
   */
  containsSequence(needles: readonly string[]): boolean {
    if (needles.length > this.argc - 1) {
      return false;
    }
    return needles.every((needle, offset) => this.argv[offset + 1] === needle);
  }

  getArgAt(index: number): string | undefined {
    return this.argv[index];
  }

  /** needle と完全一致する最初の要素の添字。実行ファイルパスも検索対象に含む。 */
  getIndexOf(needle: string): number | undefined {
    const index = this.argv.indexOf(needle);
    return index >= 0 ? index : undefined;
  }

  /** needle の直後にある引数。needle が無い、または末尾の場合は undefined。 */
  getArgAfter(needle: string): string | undefined {
    const index = this.getIndexOf(needle);
    if (index === undefined) {
      return undefined;
    }
    return this.argv[index + 1];
  }

  /** needle より後ろの引数すべて。needle が無い、または末尾の場合は undefined。 */
  getArgsAfter(needle: string): string[] | undefined {
    const index = this.getIndexOf(needle);
    if (index === undefined || index + 1 >= this.argc) {
      return undefined;
    }
    return this.argv.slice(index + 1);
  }

  getDefinitionFor(needle: string): string | undefined {
    return this.#definitions.get(needle);
  }

  getExecutable(): string {
    return this.executable;
  }

  getArgFirst(): string | undefined {
    return this.firstArg;
  }

  getArgLast(): string | undefined {
    return this.lastArg;
  }

  getArgsAfterDoubleHyphen(): readonly string[] | undefined {
    return this.doubleHyphenArgv;
  }

  getIndexOfLastOption(): number {
    return this.lastOptionIndex;
  }

  isHelpRequest(): boolean {
    return this.containsAnyOption(HELP_OPTIONS);
  }

  isVersionRequest(): boolean {
    return this.containsAnyOption(VERSION_OPTIONS);
  }

  isUsageRequest(): boolean {
    return this.containsAnyOption(USAGE_OPTIONS);
  }

  /**
   * 許可リストに無いオプションが 1 つでもあれば true。オプションが無ければ false。
   */
  hasInvalidOptions(validOptions: readonly string[]): boolean {
    return this.options.some((option) => !validOptions.includes(option));
  }

  hasInvalidDefinitions(validDefinitions: readonly string[]): boolean {
    for (const key of this.#definitions.keys()) {
      if (!validDefinitions.includes(key)) {
        return true;
      }
    }
    return false;
  }

  /** JSON 出力用に全フィールドをプレーンな値へ写す。 */
  toSnapshot(): CommandSnapshot {
    return {
      argv: [...this.argv],
      argc: this.argc,
      executable: this.executable,
      options: [...this.options],
      definitions: Object.fromEntries(this.#definitions),
      firstArg: this.firstArg ?? null,
      lastArg: this.lastArg ?? null,
      doubleHyphenArgv: this.doubleHyphenArgv ? [...this.doubleHyphenArgv] : null,
      mops: this.mops ? [...this.mops] : null,
      lastOptionIndex: this.lastOptionIndex,
    };
  }

  toString(): string {
    return `Command: '${this.argv.join(" ").trimEnd()}'`;
  }
}

function freezeOptional(values: string[] | undefined): readonly string[] | undefined {
  return values === undefined ? undefined : Object.freeze(values);
}
