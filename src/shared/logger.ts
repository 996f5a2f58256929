import singleton from "./_singleton.js";
import * as v from "./valibot.js";

/**
 * ログレベルの型定義です。
 */
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * ログレベルを定義する定数です。値が大きいほど重要度が高くなります。
 */
export const LogLevel = {
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  QUIET: 5,
} as const;

/**
 * ログレベルの名前です。環境変数などの文字列でログレベルを指定する際に使用します。
 */
export type LogLevelName = Lowercase<keyof typeof LogLevel>;

/**
 * ログレベルの名前と `LogLevel` の対応表です。
 */
const LOG_LEVEL_BY_NAME = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  quiet: LogLevel.QUIET,
} as const satisfies Record<LogLevelName, LogLevel>;

/**
 * ログレベルの名前を `LogLevel` に変換する Valibot スキーマです。大文字と小文字は区別しません。
 */
export function LogLevelNameSchema() {
  return singleton("logger__log_level_name", () => (
    v.pipe(
      v.string(),
      v.transform(name => name.trim().toLowerCase()),
      v.picklist(["debug", "info", "warn", "error", "quiet"] as const satisfies readonly LogLevelName[]),
      v.transform(name => LOG_LEVEL_BY_NAME[name]),
    )
  ));
}

/**
 * ログの内容に共通する項目です。
 *
 * @template TLevel ログレベルです。
 */
type LogEntryBase<TLevel extends LogLevel> = {
  /**
   * ログレベルです。
   */
  level: TLevel;

  /**
   * メッセージです。
   */
  message: string;
};

/**
 * ログの内容を定義する型です。bitsha が記録するのは計算経過のデバッグログと、一括計算で失敗した入力の警告だけです。
 * `INFO` と `ERROR` はしきい値としてのみ使われます。
 */
export type LogEntry =
  | LogEntryBase<typeof LogLevel.DEBUG>
  | LogEntryBase<typeof LogLevel.WARN> & {
    /**
     * 警告の原因です。
     */
    reason?: unknown;
  };

/**
 * bitsha で使用されるロガーのインターフェースです。
 * ハッシュ計算の経過や、一括計算で失敗した入力など、呼び出し元に例外として返さないものの記録しておくべきメッセージを
 * 通知する際に使用されます。
 */
export interface ILogger {
  /**
   * 指定されたログレベルとメッセージでログを記録します。
   *
   * @param entry ログの内容です。
   */
  log(entry: LogEntry): void;
}
