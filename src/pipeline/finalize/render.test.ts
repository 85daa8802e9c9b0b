import { describe, expect, it } from "vitest";
import { Command } from "../../core/command.js";
import { renderCommand, renderJson, renderText } from "./render.js";

describe("renderText", () => {
  it("各フィールドを 1 行ずつ出力する", () => {
    const command = new Command(["app", "-ab", "--out=dist", "--", "-x"]);
    expect(renderText(command)).toBe(
      [
        "Command: 'app -ab --out=dist -- -x'",
        "argc: 5",
        "executable: app",
        "options: -ab --out",
        "definitions: --out=dist",
        "first_arg: -ab",
        "last_arg: -x",
        "double_hyphen_argv: -x",
        "mops: -a -b",
        "last_option_index: 2",
      ].join("\n"),
    );
  });

  it("値が無いフィールドは (none) と表示する", () => {
    expect(renderText(new Command(["app"]))).toBe(
      [
        "Command: 'app'",
        "argc: 1",
        "executable: app",
        "options: (none)",
        "definitions: (none)",
        "first_arg: (none)",
        "last_arg: (none)",
        "double_hyphen_argv: (none)",
        "mops: (none)",
        "last_option_index: 0",
      ].join("\n"),
    );
  });
});

describe("renderJson", () => {
  it("スナップショットを整形済み JSON として出力する", () => {
    const parsed: unknown = JSON.parse(renderJson(new Command(["app", "-o", "--", "f"])));
    expect(parsed).toEqual({
      argv: ["app", "-o", "--", "f"],
      argc: 4,
      executable: "app",
      options: ["-o"],
      definitions: {},
      firstArg: "-o",
      lastArg: "f",
      doubleHyphenArgv: ["f"],
      mops: ["-o"],
      lastOptionIndex: 1,
    });
  });
});

describe("renderCommand", () => {
  it("形式に応じて出力を切り替える", () => {
    const command = new Command(["app", "run"]);
    expect(renderCommand(command, "text")).toBe(renderText(command));
    expect(renderCommand(command, "json")).toBe(renderJson(command));
  });
});
