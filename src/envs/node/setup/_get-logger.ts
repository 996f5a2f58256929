import { type ILogger, LogLevel } from "../../../shared/logger.js";
import ConsoleLogger from "../../shared/logger/console-logger.js";

function isDebugMode(): boolean {
  return ["DEBUG", "RUNNER_DEBUG", "ACTIONS_RUNNER_DEBUG", "ACTIONS_STEP_DEBUG"]
    .some(k => ["1", "true"].includes(process.env[k]?.toLowerCase() ?? ""));
}

/**
 * Node.js の環境で使用するロガーを決めます。
 *
 * 1. `logger` が指定されていればそれを使用します。
 * 2. 環境変数 `BITSHA_LOG_LEVEL` があれば、そのレベルの `ConsoleLogger` を使用します。
 * 3. デバッグ用の環境変数が `1` または `true` であれば、`DEBUG` レベルの `ConsoleLogger` を使用します。
 * 4. それ以外は `WARN` レベルの `ConsoleLogger` を使用します。
 *
 * @param logger 明示的に指定されたロガーです。
 * @returns ロガーです。
 */
export default function getLogger(logger: ILogger | undefined): ILogger {
  const level = process.env["BITSHA_LOG_LEVEL"];
  if (logger !== undefined) {
    return logger;
  } else if (level !== undefined && level !== "") {
    return new ConsoleLogger(level);
  } else if (isDebugMode()) {
    return new ConsoleLogger(LogLevel.DEBUG);
  } else {
    return new ConsoleLogger(LogLevel.WARN);
  }
}
