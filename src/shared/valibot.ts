import type { ErrorMeta } from "i18n-error-base";
import { tryCaptureStackTrace } from "try-capture-stack-trace";
import { type GenericSchema, type InferOutput, safeParse } from "valibot";
import {
  InvalidInputError,
  type Issue,
  UnexpectedValidationError,
  type ValidationErrorBase,
} from "./errors.js";

/***************************************************************************************************
 *
 * 共通の型
 *
 **************************************************************************************************/

/**
 * Valibot のスキーマ型を抽出するための基本型です。
 */
type BaseSchema = GenericSchema;

/***************************************************************************************************
 *
 * 再エクスポート
 *
 **************************************************************************************************/

export {
  bigint,
  brand,
  integer,
  length,
  maxValue,
  minValue,
  number,
  picklist,
  pipe,
  readonly,
  regex,
  safeParse,
  string,
  transform,
  tuple,
} from "valibot";
export type { Brand, InferInput, InferOutput } from "valibot";

export * from "./valibot-extra.js";

/***************************************************************************************************
 *
 * parse
 *
 **************************************************************************************************/

/**
 * 検証エラーの問題点と入力値から、投げるエラーを作るコンストラクターです。
 */
export interface IParseError {
  new(issues: [Issue, ...Issue[]], input: unknown): ValidationErrorBase<ErrorMeta>;
}

/**
 * 入力値をスキーマで検証し、出力値を返します。検証に失敗した場合は `Error` のインスタンスを投げます。
 *
 * @template TSchema スキーマの型です。
 * @param schema スキーマです。
 * @param input 入力値です。
 * @param Error 検証に失敗した場合に投げるエラーのコンストラクターです。
 * @returns スキーマの出力値です。
 */
export function parse<const TSchema extends BaseSchema>(
  schema: TSchema,
  input: unknown,
  Error: IParseError = InvalidInputError,
): InferOutput<TSchema> {
  const result = safeParse(schema, input);
  if (result.success) {
    return result.output;
  }

  const error = new Error(result.issues, input);
  tryCaptureStackTrace(error, parse);
  throw error;
}

/**
 * 内部で生成した値をスキーマで検証し、出力値を返します。検証に失敗した場合は `UnexpectedValidationError` を投げます。
 *
 * @template TSchema スキーマの型です。
 * @param schema スキーマです。
 * @param input 内部で生成した値です。
 * @returns スキーマの出力値です。
 */
export function expect<const TSchema extends BaseSchema>(
  schema: TSchema,
  input: unknown,
): InferOutput<TSchema> {
  const result = safeParse(schema, input);
  if (result.success) {
    return result.output;
  }

  const error = new UnexpectedValidationError(result.issues, input);
  tryCaptureStackTrace(error, expect);
  throw error;
}
