import singleton from "./_singleton.js";
import * as v from "./valibot.js";

/**
 * 符号付き 128 ビット整数の最小値です。
 */
export const INT128_MIN = -(1n << 127n);

/**
 * 符号付き 128 ビット整数の最大値です。
 */
export const INT128_MAX = (1n << 127n) - 1n;

/**
 * 符号なし 32 ビット整数の最大値です。
 */
export const UINT32_MAX = 0xffff_ffff;

/**
 * ビット列 (`'0'` と `'1'` だけからなる文字列) の Valibot スキーマです。空文字列も有効なビット列です。
 */
export function BitStringSchema() {
  return singleton("schemas__bit_string", () => (
    v.pipe(
      v.string(),
      v.regex(/^[01]*$/u),
      v.brand("BitString"),
    )
  ));
}

/**
 * ビット列です。最上位ビットが先頭です。
 */
export type BitStringLike = v.InferInput<ReturnType<typeof BitStringSchema>>;

/**
 * ビット列です。最上位ビットが先頭です。
 */
export type BitString = v.InferOutput<ReturnType<typeof BitStringSchema>>;

/**
 * 16 進数文字列の Valibot スキーマです。大文字と小文字は区別しません。空文字列も有効です。
 */
export function HexStringSchema() {
  return singleton("schemas__hex_string", () => (
    v.pipe(
      v.string(),
      v.regex(/^[0-9a-f]*$/iu),
      v.brand("HexString"),
    )
  ));
}

/**
 * 16 進数文字列です。
 */
export type HexStringLike = v.InferInput<ReturnType<typeof HexStringSchema>>;

/**
 * 16 進数文字列です。
 */
export type HexString = v.InferOutput<ReturnType<typeof HexStringSchema>>;

/**
 * 10 進数文字列の Valibot スキーマです。
 * 先頭に `+` または `-` の符号を 1 つだけ付けることができ、それ以外は ASCII の数字のみで構成されます。空白や区切り文字は受け付けません。
 */
export function DecimalStringSchema() {
  return singleton("schemas__decimal_string", () => (
    v.pipe(
      v.string(),
      v.regex(/^[+-]?[0-9]+$/u),
      v.brand("DecimalString"),
    )
  ));
}

/**
 * 10 進数文字列です。
 */
export type DecimalStringLike = v.InferInput<ReturnType<typeof DecimalStringSchema>>;

/**
 * 10 進数文字列です。
 */
export type DecimalString = v.InferOutput<ReturnType<typeof DecimalStringSchema>>;

/**
 * SHA-256 のハッシュ値を表す 16 進数文字列の Valibot スキーマです。64 桁 (256 ビット) である必要があります。
 */
export function DigestHexSchema() {
  return singleton("schemas__digest_hex", () => (
    v.pipe(
      v.string(),
      // 正規表現のオーバーヘッドが発生する前に `.length` で高速に検証します。
      v.length(64),
      v.regex(/^[0-9a-f]*$/iu),
      v.brand("DigestHex"),
    )
  ));
}

/**
 * SHA-256 のハッシュ値を表す 16 進数文字列です。
 */
export type DigestHexLike = v.InferInput<ReturnType<typeof DigestHexSchema>>;

/**
 * SHA-256 のハッシュ値を表す 16 進数文字列です。
 */
export type DigestHex = v.InferOutput<ReturnType<typeof DigestHexSchema>>;

/**
 * 符号なし 32 ビット整数 (ワード) の Valibot スキーマです。
 */
export function WordSchema() {
  return singleton("schemas__word", () => (
    v.pipe(
      v.number(),
      v.integer(),
      v.minValue(0),
      v.maxValue(UINT32_MAX),
      v.brand("Word"),
    )
  ));
}

/**
 * 符号なし 32 ビット整数 (ワード) です。
 */
export type WordLike = v.InferInput<ReturnType<typeof WordSchema>>;

/**
 * 符号なし 32 ビット整数 (ワード) です。
 */
export type Word = v.InferOutput<ReturnType<typeof WordSchema>>;

/**
 * 8 つのワードからなるハッシュ関数の内部状態の Valibot スキーマです。
 */
export function HashStateSchema() {
  return singleton("schemas__hash_state", () => (
    v.pipe(
      v.tuple([
        WordSchema(),
        WordSchema(),
        WordSchema(),
        WordSchema(),
        WordSchema(),
        WordSchema(),
        WordSchema(),
        WordSchema(),
      ]),
      v.readonly(),
      v.brand("HashState"),
    )
  ));
}

/**
 * ハッシュ関数の内部状態 (a, b, c, d, e, f, g, h の 8 ワード) です。
 */
export type HashStateLike = v.InferInput<ReturnType<typeof HashStateSchema>>;

/**
 * ハッシュ関数の内部状態 (a, b, c, d, e, f, g, h の 8 ワード) です。
 */
export type HashState = v.InferOutput<ReturnType<typeof HashStateSchema>>;

/**
 * 符号なし 256 ビット整数の最大値です。
 */
export const UINT256_MAX = (1n << 256n) - 1n;

/**
 * 符号なし 256 ビット整数の Valibot スキーマです。
 */
export function Uint256Schema() {
  return singleton("schemas__uint256", () => (
    v.pipe(
      v.bigint(),
      v.minValue(0n),
      v.maxValue(UINT256_MAX),
      v.brand("Uint256"),
    )
  ));
}

/**
 * 符号なし 256 ビット整数です。
 */
export type Uint256Like = v.InferInput<ReturnType<typeof Uint256Schema>>;

/**
 * 符号なし 256 ビット整数です。
 */
export type Uint256 = v.InferOutput<ReturnType<typeof Uint256Schema>>;
