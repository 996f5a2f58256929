import { type ILogger, type LogEntry, LogLevel, LogLevelNameSchema } from "../../../shared/logger.js";
import * as v from "../../../shared/valibot.js";

/**
 * `console` にログを書き出すロガーです。
 */
export default class ConsoleLogger implements ILogger {
  /**
   * 記録するログレベルのしきい値です。
   */
  public readonly level: LogLevel;

  /**
   * @param level しきい値、またはその名前 (`"debug"` など) です。既定は `LogLevel.WARN` です。
   */
  public constructor(level: LogLevel | string | undefined = LogLevel.WARN) {
    this.level = typeof level === "string"
      ? v.parse(LogLevelNameSchema(), level)
      : level;
  }

  public log(entry: LogEntry): void {
    if (entry.level < this.level) {
      return;
    }

    if (entry.level === LogLevel.DEBUG) {
      console.debug(entry.message);
    } else if (entry.reason === undefined) {
      console.warn(entry.message);
    } else {
      console.warn(entry.message, entry.reason);
    }
  }
}
