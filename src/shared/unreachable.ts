import { tryCaptureStackTrace } from "try-capture-stack-trace";
import { UnreachableError } from "./errors.js";

/**
 * 到達不能なコードに到達したことを示します。`switch` 文の網羅性の検査に使用します。
 *
 * @param args 到達しないはずの値があれば指定します。
 */
export default function unreachable(...args: [never?]): never {
  const error = new UnreachableError(args);
  tryCaptureStackTrace(error, unreachable);
  throw error;
}
