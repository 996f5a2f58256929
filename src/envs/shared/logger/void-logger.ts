import type { ILogger, LogEntry } from "../../../shared/logger.js";

/**
 * ログをどこにも記録せず、単に破棄するだけのロガーです。
 * `Hasher` に何も指定しなかったときの既定のロガーです。
 */
export default class VoidLogger implements ILogger {
  /**
   * 何も処理を行いません。
   *
   * @param _entry ログの内容です。
   */
  log(_entry: LogEntry): void {}
}
