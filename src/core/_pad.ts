import { type BitString, BitStringSchema } from "../shared/schemas.js";
import * as v from "../shared/valibot.js";

/**
 * ブロックのビット数です。
 */
export const BLOCK_BITS = 512;

/**
 * メッセージ長のフィールドのビット数です。
 */
export const LENGTH_FIELD_BITS = 64;

/**
 * SHA-256 のパディングを付けたビット列を返します。
 *
 * 末尾に `1` を 1 ビット追加し、長さが 512 を法として 448 になるまで `0` を追加し、最後にパディング前のビット長を
 * 64 ビットのビッグエンディアンで追加します。長さのフィールドが収まらない場合は、次のブロックにはみ出します。
 *
 * @param bits パディング前のビット列です。
 * @returns 長さが 512 の倍数のビット列です。
 */
export default function pad(bits: BitString): BitString {
  const bitLength = bits.length;
  const zeros = (BLOCK_BITS - LENGTH_FIELD_BITS - (bitLength + 1) % BLOCK_BITS + BLOCK_BITS) % BLOCK_BITS;
  const lengthField = bitLength.toString(2).padStart(LENGTH_FIELD_BITS, "0");

  return v.expect(BitStringSchema(), bits + "1" + "0".repeat(zeros) + lengthField);
}
