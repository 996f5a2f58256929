import { type ErrorMeta, I18nErrorBase, initErrorMessage, setErrorMessage } from "i18n-error-base";
import { type BaseIssue } from "valibot";
import quoteString from "./quote-string.js";

/***************************************************************************************************
 *
 * ユーティリティー
 *
 **************************************************************************************************/

/**
 * あらゆる値を文字列に整形します。
 *
 * @param value 文字列に整形する値です。
 * @returns 文字列に整形された値です。
 */
export function formatErrorValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }

  if (typeof value === "bigint") {
    return value.toString();
  }

  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/***************************************************************************************************
 *
 * エラークラス
 *
 **************************************************************************************************/

/**
 * bitsha エラーの基底クラスです。
 *
 * @template TMeta エラーに紐づくメタデータです。
 */
export class ErrorBase<TMeta extends ErrorMeta | undefined = undefined>
  extends I18nErrorBase<TMeta>
{}

/**************************************************************************************************/

/**
 * 到達不能なコードに到達した場合に投げられるエラーです。
 */
export class UnreachableError extends ErrorBase<{
  /**
   * 到達しないはずの値です。
   */
  value?: unknown;
}> {
  static {
    this.prototype.name = "BitshaUnreachableError";
  }

  /**
   * `BitshaUnreachableError` クラスの新しいインスタンスを初期化します。
   *
   * @param args 到達しないはずの値があれば指定します。
   * @param options エラーのオプションです。
   */
  public constructor(args: [never?], options?: ErrorOptions | undefined) {
    super(options, args.length > 0 ? { value: args[0] } : {});
    initErrorMessage(this, ({ meta }) => (
      "value" in meta
        ? "Encountered impossible value: " + formatErrorValue(meta.value)
        : "Unreachable code reached"
    ));
  }
}

/*#__PURE__*/ setErrorMessage(
  UnreachableError,
  ({ meta }) => (
    "value" in meta
      ? "不可能な値に遭遇しました: " + formatErrorValue(meta.value)
      : "到達できないコードに到達しました"
  ),
  "ja",
);

/**************************************************************************************************/

/**
 * 検証エラーの問題点です。
 */
export type Issue = BaseIssue<unknown>;

/**
 * 検証エラーの基底クラスです。
 *
 * @template TMeta エラーに紐づくメタデータです。
 */
export class ValidationErrorBase<TMeta extends ErrorMeta> extends ErrorBase<TMeta> {
  /**
   * @internal
   */
  public constructor(options: ErrorOptions | undefined, meta: TMeta) {
    super(options, meta);
  }
}

/**
 * 検証エラーに共通するメタデータです。
 */
type ValidationMeta = {
  /**
   * 検証エラーの問題点です。
   */
  issues: [Issue, ...Issue[]];

  /**
   * 検証した入力値です。
   */
  input: unknown;
};

/**************************************************************************************************/

/**
 * 入力値検証エラーの基底クラスです。
 *
 * @template TMeta エラーに紐づくメタデータです。
 */
export class InvalidInputErrorBase<TMeta extends ErrorMeta> extends ValidationErrorBase<TMeta> {
  /**
   * @internal
   */
  public constructor(options: ErrorOptions | undefined, meta: TMeta) {
    super(options, meta);
  }
}

/**************************************************************************************************/

/**
 * 入力値の検証に失敗した場合に投げられるエラーです。
 */
export class InvalidInputError extends InvalidInputErrorBase<ValidationMeta> {
  static {
    this.prototype.name = "BitshaInvalidInputError";
  }

  /**
   * `BitshaInvalidInputError` クラスの新しいインスタンスを初期化します。
   *
   * @param issues 検証エラーの問題点です。
   * @param input 検証した入力値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    issues: [Issue, ...Issue[]],
    input: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { issues, input });
    initErrorMessage(this, ({ meta }) => meta.issues.map(issue => issue.message).join(": "));
  }
}

/**************************************************************************************************/

/**
 * 内部で生成した値の検証に失敗した場合に投げられるエラーです。これが投げられた場合はバグです。
 */
export class UnexpectedValidationError extends ValidationErrorBase<ValidationMeta> {
  static {
    this.prototype.name = "BitshaUnexpectedValidationError";
  }

  /**
   * `BitshaUnexpectedValidationError` クラスの新しいインスタンスを初期化します。
   *
   * @param issues 検証エラーの問題点です。
   * @param input 検証した値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    issues: [Issue, ...Issue[]],
    input: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { issues, input });
    initErrorMessage(this, ({ meta }) => (
      "Unexpected validation error: " + meta.issues.map(i => i.message).join(": ")
    ));
  }
}

/*#__PURE__*/ setErrorMessage(
  UnexpectedValidationError,
  ({ meta }) => "予期しない検証エラー: " + meta.issues.map(i => i.message).join(": "),
  "ja",
);

/***************************************************************************************************
 *
 * ハッシュ計算のエラー
 *
 **************************************************************************************************/

/**
 * 2 進数として解釈できない入力を受け取った場合に投げられるエラーです。
 */
export class InvalidBinaryError extends InvalidInputErrorBase<ValidationMeta> {
  static {
    this.prototype.name = "BitshaInvalidBinaryError";
  }

  /**
   * `BitshaInvalidBinaryError` クラスの新しいインスタンスを初期化します。
   *
   * @param issues 検証エラーの問題点です。
   * @param input 検証した入力値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    issues: [Issue, ...Issue[]],
    input: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { issues, input });
    initErrorMessage(this, ({ meta }) => (
      "Invalid binary: " + quoteString(formatErrorValue(meta.input))
    ));
  }
}

/*#__PURE__*/ setErrorMessage(
  InvalidBinaryError,
  ({ meta }) => "無効な 2 進数: " + quoteString(formatErrorValue(meta.input)),
  "ja",
);

/**************************************************************************************************/

/**
 * 16 進数として解釈できない入力を受け取った場合に投げられるエラーです。
 */
export class InvalidHexError extends InvalidInputErrorBase<ValidationMeta> {
  static {
    this.prototype.name = "BitshaInvalidHexError";
  }

  /**
   * `BitshaInvalidHexError` クラスの新しいインスタンスを初期化します。
   *
   * @param issues 検証エラーの問題点です。
   * @param input 検証した入力値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    issues: [Issue, ...Issue[]],
    input: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { issues, input });
    initErrorMessage(this, ({ meta }) => (
      "Invalid hex: " + quoteString(formatErrorValue(meta.input))
    ));
  }
}

/*#__PURE__*/ setErrorMessage(
  InvalidHexError,
  ({ meta }) => "無効な 16 進数: " + quoteString(formatErrorValue(meta.input)),
  "ja",
);

/**************************************************************************************************/

/**
 * 10 進数として解釈できない入力を受け取った場合に投げられるエラーです。
 */
export class InvalidDecimalError extends InvalidInputErrorBase<ValidationMeta> {
  static {
    this.prototype.name = "BitshaInvalidDecimalError";
  }

  /**
   * `BitshaInvalidDecimalError` クラスの新しいインスタンスを初期化します。
   *
   * @param issues 検証エラーの問題点です。
   * @param input 検証した入力値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    issues: [Issue, ...Issue[]],
    input: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { issues, input });
    initErrorMessage(this, ({ meta }) => (
      "Invalid decimal: " + quoteString(formatErrorValue(meta.input))
    ));
  }
}

/*#__PURE__*/ setErrorMessage(
  InvalidDecimalError,
  ({ meta }) => "無効な 10 進数: " + quoteString(formatErrorValue(meta.input)),
  "ja",
);

/**************************************************************************************************/

/**
 * 10 進数が符号付き 128 ビット整数の範囲に収まらない場合に投げられるエラーです。
 * 大きな値は 16 進数に変換して入力することで回避できます。
 */
export class DecimalTooLargeError extends InvalidInputErrorBase<{
  /**
   * 入力された 10 進数の文字列です。
   */
  input: string;

  /**
   * 受け付ける最小値です。
   */
  min: string;

  /**
   * 受け付ける最大値です。
   */
  max: string;
}> {
  static {
    this.prototype.name = "BitshaDecimalTooLargeError";
  }

  /**
   * `BitshaDecimalTooLargeError` クラスの新しいインスタンスを初期化します。
   *
   * @param input 入力された 10 進数の文字列です。
   * @param range 受け付ける値の範囲です。
   * @param options エラーのオプションです。
   */
  public constructor(
    input: string,
    range: Readonly<{ min: bigint; max: bigint }>,
    options?: ErrorOptions | undefined,
  ) {
    super(options, {
      input,
      min: range.min.toString(),
      max: range.max.toString(),
    });
    initErrorMessage(this, ({ meta }) => (
      `Decimal out of range [${meta.min}, ${meta.max}]: ${quoteString(meta.input)}`
      + ": Use hex input for larger values"
    ));
  }
}

/*#__PURE__*/ setErrorMessage(
  DecimalTooLargeError,
  ({ meta }) => (
    `10 進数が範囲 [${meta.min}, ${meta.max}] の外にあります: ${quoteString(meta.input)}`
    + ": より大きな値は 16 進数で入力してください"
  ),
  "ja",
);

/**************************************************************************************************/

/**
 * リトルエンディアンの入力がバイト単位で区切れない場合に投げられるエラーです。
 */
export class NotWholeBytesError extends InvalidInputErrorBase<ValidationMeta> {
  static {
    this.prototype.name = "BitshaNotWholeBytesError";
  }

  /**
   * `BitshaNotWholeBytesError` クラスの新しいインスタンスを初期化します。
   *
   * @param issues 検証エラーの問題点です。
   * @param input 検証した入力値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    issues: [Issue, ...Issue[]],
    input: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { issues, input });
    initErrorMessage(this, ({ meta }) => (
      "Little-endian input must be a whole number of bytes: "
      + quoteString(formatErrorValue(meta.input))
    ));
  }
}

/*#__PURE__*/ setErrorMessage(
  NotWholeBytesError,
  ({ meta }) => (
    "リトルエンディアンの入力はバイト単位である必要があります: "
    + quoteString(formatErrorValue(meta.input))
  ),
  "ja",
);

/**************************************************************************************************/

/**
 * ハッシュ値として無効な 16 進数文字列を受け取った場合に投げられるエラーです。
 */
export class InvalidHashError extends InvalidInputErrorBase<ValidationMeta> {
  static {
    this.prototype.name = "BitshaInvalidHashError";
  }

  /**
   * `BitshaInvalidHashError` クラスの新しいインスタンスを初期化します。
   *
   * @param issues 検証エラーの問題点です。
   * @param input 検証した入力値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    issues: [Issue, ...Issue[]],
    input: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { issues, input });
    initErrorMessage(this, ({ meta }) => (
      "Invalid hash: " + quoteString(formatErrorValue(meta.input))
    ));
  }
}

/*#__PURE__*/ setErrorMessage(
  InvalidHashError,
  ({ meta }) => "無効なハッシュ値: " + quoteString(formatErrorValue(meta.input)),
  "ja",
);

/**************************************************************************************************/

/**
 * ファイルシステムに関連するエラーの基底クラスです。
 *
 * @template TMeta エラーに紐づくメタデータです。
 */
export class FileSystemErrorBase<TMeta extends ErrorMeta | undefined = undefined>
  extends ErrorBase<TMeta>
{
  /**
   * @internal
   */
  public constructor(options: ErrorOptions | undefined, meta: TMeta) {
    super(options, meta);
  }
}

/**************************************************************************************************/

/**
 * ファイルシステム上にエントリーが見つからない場合に投げられるエラーです。
 */
export class EntryPathNotFoundError extends FileSystemErrorBase<{
  /**
   * エントリーのパスです。
   */
  path: string;
}> {
  static {
    this.prototype.name = "BitshaEntryPathNotFoundError";
  }

  /**
   * `BitshaEntryPathNotFoundError` クラスの新しいインスタンスを初期化します。
   *
   * @param path エントリーのパスです。
   * @param options エラーのオプションです。
   */
  public constructor(path: string, options?: ErrorOptions | undefined) {
    super(options, { path });
    initErrorMessage(this, ({ meta }) => "Entry path not found: " + quoteString(meta.path));
  }
}

/*#__PURE__*/ setErrorMessage(
  EntryPathNotFoundError,
  ({ meta }) => "エントリーパスが見つかりません: " + quoteString(meta.path),
  "ja",
);

/**************************************************************************************************/

/**
 * ファイルを開けない、読み込めない、または UTF-8 としてデコードできない場合に投げられるエラーです。
 * 失敗の理由は区別せず、元の例外は `cause` に保持します。
 */
export class FileReadError extends FileSystemErrorBase<{
  /**
   * 読み込もうとしたファイルのパスです。
   */
  path: string;
}> {
  static {
    this.prototype.name = "BitshaFileReadError";
  }

  /**
   * `BitshaFileReadError` クラスの新しいインスタンスを初期化します。
   *
   * @param path 読み込もうとしたファイルのパスです。
   * @param options エラーのオプションです。
   */
  public constructor(path: string, options?: ErrorOptions | undefined) {
    super(options, { path });
    initErrorMessage(this, ({ meta }) => "Failed to read file: " + quoteString(meta.path));
  }
}

/*#__PURE__*/ setErrorMessage(
  FileReadError,
  ({ meta }) => "ファイルを読み込めません: " + quoteString(meta.path),
  "ja",
);

/***************************************************************************************************
 *
 * ハッシュ計算のエラーの集合
 *
 **************************************************************************************************/

/**
 * ハッシュ計算が呼び出し元に返しうるエラーです。
 */
export type HashError =
  | DecimalTooLargeError
  | InvalidBinaryError
  | InvalidHexError
  | InvalidDecimalError
  | FileReadError
  | NotWholeBytesError
  | InvalidHashError;

/**
 * 引数に与えられた値がハッシュ計算のエラーかどうかを判定します。
 *
 * @param value 判定する値です。
 * @returns `value` が `HashError` であれば `true`、そうでなければ `false` です。
 */
export function isHashError(value: unknown): value is HashError {
  return (
    value instanceof DecimalTooLargeError
    || value instanceof InvalidBinaryError
    || value instanceof InvalidHexError
    || value instanceof InvalidDecimalError
    || value instanceof FileReadError
    || value instanceof NotWholeBytesError
    || value instanceof InvalidHashError
  );
}
