import { describe, test } from "vitest";
import { InvalidInputError } from "../../src/shared/errors.js";
import { LogLevel, LogLevelNameSchema } from "../../src/shared/logger.js";
import * as v from "../../src/shared/valibot.js";

test("LogLevel の値はすべて異なる", ({ expect }) => {
  const uniqueKeyCount = Object.keys(LogLevel).length;
  const uniqueValueCount = new Set(Object.values(LogLevel)).size;

  expect(uniqueKeyCount).toBe(uniqueValueCount);
});

test("LogLevel は重要度の昇順に並んでいる", ({ expect }) => {
  expect(Object.values(LogLevel)).toStrictEqual([1, 2, 3, 4, 5]);
});

describe("LogLevelNameSchema", () => {
  test("ログレベルの名前を LogLevel に変換する", ({ expect }) => {
    expect(v.parse(LogLevelNameSchema(), "debug")).toBe(LogLevel.DEBUG);
    expect(v.parse(LogLevelNameSchema(), "info")).toBe(LogLevel.INFO);
    expect(v.parse(LogLevelNameSchema(), "warn")).toBe(LogLevel.WARN);
    expect(v.parse(LogLevelNameSchema(), "error")).toBe(LogLevel.ERROR);
    expect(v.parse(LogLevelNameSchema(), "quiet")).toBe(LogLevel.QUIET);
  });

  test("大文字と小文字や前後の空白は無視する", ({ expect }) => {
    expect(v.parse(LogLevelNameSchema(), " Debug ")).toBe(LogLevel.DEBUG);
    expect(v.parse(LogLevelNameSchema(), "WARN")).toBe(LogLevel.WARN);
  });

  test("未知の名前は InvalidInputError になる", ({ expect }) => {
    expect(() => v.parse(LogLevelNameSchema(), "verbose")).toThrow(InvalidInputError);
  });
});
