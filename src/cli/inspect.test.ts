import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { transports } from "winston";
import { Command } from "../core/command.js";
import { createCliLogger } from "../foundation/logger/create-cli-logger.js";
import type { CliLogger } from "../foundation/logger/types.js";
import { renderText } from "../pipeline/finalize/render.js";
import type { CliDefaults } from "../types.js";
import { buildInspectProgram, parseInspectOptions, runInspect } from "./inspect.js";

const ENV_KEYS = ["ARGV_VIEW_FORMAT", "ARGV_VIEW_DEBUG"] as const;
const DEFAULTS: CliDefaults = { format: "text", debug: false };

function parse(argv: string[], defaults: CliDefaults = DEFAULTS) {
  const program = buildInspectProgram(defaults, { writeOut: () => undefined });
  return parseInspectOptions(argv, defaults, program);
}

describe("buildInspectProgram", () => {
  it("フラグとヘルプを登録する", () => {
    const program = buildInspectProgram(DEFAULTS, { writeOut: () => undefined });
    const optionFlags = program.options.map((option) => option.flags);
    expect(optionFlags).toContain("-f, --format <format>");
    expect(optionFlags).toContain("-o, --output <path>");
    expect(optionFlags).toContain("--debug");
    expect(program.helpInformation()).toContain("-?, --help");
  });
});

describe("parseInspectOptions", () => {
  it("-- 以降を解析対象の引数列として受け取る", () => {
    expect(parse(["--", "app", "-abc", "--opt=val"])).toEqual({
      format: "text",
      outputPath: undefined,
      debug: false,
      argv: ["app", "-abc", "--opt=val"],
      helpRequested: false,
    });
  });

  it("最初の位置引数以降のオプションは CLI 側で解釈しない", () => {
    const options = parse(["-f", "json", "app", "-o", "--", "x"]);
    expect(options.format).toBe("json");
    expect(options.argv).toEqual(["app", "-o", "--", "x"]);
  });

  it("解析対象の 2 つ目の -- はそのまま残す", () => {
    expect(parse(["--", "app", "--", "-x"]).argv).toEqual(["app", "--", "-x"]);
  });

  it("出力形式の大文字小文字を無視する", () => {
    expect(parse(["--format", "JSON", "--", "app"]).format).toBe("json");
  });

  it("既定値の出力形式とデバッグ設定を引き継ぐ", () => {
    const options = parse(["--", "app"], { format: "json", debug: true });
    expect(options.format).toBe("json");
    expect(options.debug).toBe(true);
  });

  it("--output の前後の空白を取り除く", () => {
    expect(parse(["--output", " view.txt ", "--", "app"]).outputPath).toBe("view.txt");
  });

  it("不正な出力形式はエラーになる", () => {
    expect(() => parse(["--format", "yaml", "--", "app"])).toThrow(
      "Error: --format には text または json を指定してください",
    );
  });

  it("解析対象が空の場合はエラーになる", () => {
    expect(() => parse([])).toThrow("Error: 解析する引数列を指定してください");
  });

  it("ヘルプ要求を結果として返す", () => {
    expect(parse(["--help"]).helpRequested).toBe(true);
  });
});

describe("runInspect", () => {
  let tmpDir: string;
  let envBackup: Map<string, string | undefined>;

  beforeEach(async () => {
    envBackup = new Map();
    for (const key of ENV_KEYS) {
      envBackup.set(key, process.env[key]);
      delete process.env[key];
    }
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "argv-view-cli-"));
  });

  afterEach(async () => {
    for (const [key, value] of envBackup) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function run(argv: string[]): Promise<{ code: number; out: string; logs: string[] }> {
    const { logger, logs } = createCapturedLogger();
    let out = "";
    const code = await runInspect(argv, {
      writeOut: (text) => {
        out += text;
      },
      logger,
      configEnvOptions: { baseDir: tmpDir },
      cwd: tmpDir,
    });
    await new Promise((resolve) => setImmediate(resolve));
    return { code, out, logs };
  }

  it("テキスト形式で分類結果を標準出力へ書き出す", async () => {
    const result = await run(["--", "app", "-abc", "--opt=val"]);
    expect(result.code).toBe(0);
    expect(result.out).toBe(`${renderText(new Command(["app", "-abc", "--opt=val"]))}\n`);
  });

  it("JSON 形式で分類結果を書き出す", async () => {
    const result = await run(["--format", "json", "--", "app", "-o", "--", "x"]);
    expect(result.code).toBe(0);
    const parsed: unknown = JSON.parse(result.out);
    expect(parsed).toEqual(new Command(["app", "-o", "--", "x"]).toSnapshot());
  });

  it(".env の ARGV_VIEW_FORMAT を既定の出力形式として使う", async () => {
    await fs.writeFile(path.join(tmpDir, ".env"), "ARGV_VIEW_FORMAT=json\n");
    const result = await run(["--", "app"]);
    expect(result.code).toBe(0);
    const parsed: unknown = JSON.parse(result.out);
    expect(parsed).toEqual(new Command(["app"]).toSnapshot());
  });

  it("--output 指定時はファイルへ保存して標準出力には書かない", async () => {
    const result = await run(["--output", "view.txt", "--", "app", "run"]);
    expect(result.code).toBe(0);
    expect(result.out).toBe("");
    const saved = await fs.readFile(path.join(tmpDir, "view.txt"), "utf8");
    expect(saved).toBe(`${renderText(new Command(["app", "run"]))}\n`);
    const savedLine = `saved: ${path.join(tmpDir, "view.txt")}`;
    expect(result.logs.some((line) => line.includes(savedLine))).toBe(true);
  });

  it("--debug 指定時は分類結果を debug ログへ出力する", async () => {
    const result = await run(["--debug", "--", "app", "-x"]);
    expect(result.code).toBe(0);
    const debugLine = result.logs.find((line) => line.includes("debug: classified"));
    expect(debugLine).toContain('"options":["-x"]');
  });

  it("--debug が無ければ debug ログを出力しない", async () => {
    const result = await run(["--", "app", "-x"]);
    expect(result.logs).toEqual([]);
  });

  it("ヘルプを表示して終了コード 0 を返す", async () => {
    const result = await run(["--help"]);
    expect(result.code).toBe(0);
    expect(result.out).toContain("Usage: argv-view [options] [argv...]");
  });

  it("解析対象が無い場合はエラーログを出して終了コード 1 を返す", async () => {
    const result = await run([]);
    expect(result.code).toBe(1);
    expect(result.out).toBe("");
    expect(result.logs[0]).toContain("error: Error: 解析する引数列を指定してください");
  });

  it("不正な設定値はエラーログを出して終了コード 1 を返す", async () => {
    await fs.writeFile(path.join(tmpDir, ".env"), "ARGV_VIEW_DEBUG=maybe\n");
    const result = await run(["--", "app"]);
    expect(result.code).toBe(1);
    expect(result.logs[0]).toContain("ARGV_VIEW_DEBUG must be one of");
  });
});

function createCapturedLogger(): { logger: CliLogger; logs: string[] } {
  const logger = createCliLogger({ label: "argv-view", debug: false });
  const logs: string[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      logs.push(chunk.toString().trim());
      callback();
    },
  });
  logger.clear();
  logger.add(new transports.Stream({ stream: sink, level: logger.level }));
  return { logger, logs };
}
