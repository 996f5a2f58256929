export type * from "./core/digest.js";
export { default as Digest } from "./core/digest.js";

export type * from "./core/hasher.js";
export { default as Hasher } from "./core/hasher.js";

export type * from "./envs/shared/file-system/memory-file-system.js";
export { default as MemoryFileSystem } from "./envs/shared/file-system/memory-file-system.js";

export type * from "./envs/shared/logger/console-logger.js";
export { default as ConsoleLogger } from "./envs/shared/logger/console-logger.js";

export type * from "./envs/shared/logger/void-logger.js";
export { default as VoidLogger } from "./envs/shared/logger/void-logger.js";

export type { HashError, Issue } from "./shared/errors.js";
export {
  DecimalTooLargeError,
  EntryPathNotFoundError,
  ErrorBase,
  FileReadError,
  FileSystemErrorBase,
  formatErrorValue,
  InvalidBinaryError,
  InvalidDecimalError,
  InvalidHashError,
  InvalidHexError,
  InvalidInputError,
  InvalidInputErrorBase,
  isHashError,
  NotWholeBytesError,
  UnexpectedValidationError,
  UnreachableError,
  ValidationErrorBase,
} from "./shared/errors.js";

export type * from "./shared/file-system.js";

export type { InputKindLike } from "./shared/input-kind.js";
export { InputKind, InputKindSchema } from "./shared/input-kind.js";

export type { ILogger, LogEntry, LogLevelName } from "./shared/logger.js";
export { LogLevel, LogLevelNameSchema } from "./shared/logger.js";

export type {
  BitString,
  BitStringLike,
  DecimalString,
  DecimalStringLike,
  DigestHex,
  DigestHexLike,
  HashState,
  HashStateLike,
  HexString,
  HexStringLike,
  Uint256,
  Uint256Like,
  Word,
  WordLike,
} from "./shared/schemas.js";
export {
  BitStringSchema,
  DecimalStringSchema,
  DigestHexSchema,
  HashStateSchema,
  HexStringSchema,
  INT128_MAX,
  INT128_MIN,
  UINT256_MAX,
  UINT32_MAX,
  Uint256Schema,
  WordSchema,
} from "./shared/schemas.js";

export { default as splitLines } from "./shared/split-lines.js";

export type * from "./shared/tracer.js";
