import { afterEach, describe, test, vi } from "vitest";
import ConsoleLogger from "../../../../src/envs/shared/logger/console-logger.js";
import { InvalidInputError } from "../../../../src/shared/errors.js";
import { LogLevel } from "../../../../src/shared/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("constructor", () => {
  test("既定のしきい値は WARN", ({ expect }) => {
    expect(new ConsoleLogger().level).toBe(LogLevel.WARN);
  });

  test("ログレベルの名前を受け付ける", ({ expect }) => {
    expect(new ConsoleLogger("debug").level).toBe(LogLevel.DEBUG);
    expect(new ConsoleLogger("Quiet").level).toBe(LogLevel.QUIET);
  });

  test("未知の名前は InvalidInputError", ({ expect }) => {
    expect(() => new ConsoleLogger("verbose")).toThrow(InvalidInputError);
  });
});

describe("log", () => {
  test("しきい値未満のログは出力しない", ({ expect }) => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    new ConsoleLogger(LogLevel.WARN).log({ level: LogLevel.DEBUG, message: "d" });

    expect(debug).not.toHaveBeenCalled();
  });

  test("デバッグログは console.debug に出力する", ({ expect }) => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    new ConsoleLogger(LogLevel.DEBUG).log({ level: LogLevel.DEBUG, message: "d" });

    expect(debug).toHaveBeenCalledWith("d");
  });

  test("警告は原因があれば一緒に console.warn に出力する", ({ expect }) => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const reason = new Error("原因");
    const logger = new ConsoleLogger(LogLevel.WARN);
    logger.log({ level: LogLevel.WARN, message: "w1", reason });
    logger.log({ level: LogLevel.WARN, message: "w2" });

    expect(warn.mock.calls).toStrictEqual([["w1", reason], ["w2"]]);
  });

  test("ERROR 以上のしきい値では警告も出力しない", ({ expect }) => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    new ConsoleLogger("error").log({ level: LogLevel.WARN, message: "w" });
    new ConsoleLogger(LogLevel.QUIET).log({ level: LogLevel.WARN, message: "w" });

    expect(warn).not.toHaveBeenCalled();
  });
});
