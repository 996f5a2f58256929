import singleton from "../shared/_singleton.js";
import { type BitString, BitStringSchema } from "../shared/schemas.js";
import * as v from "../shared/valibot.js";
import { BLOCK_BITS } from "./_pad.js";

/**
 * ワードのビット数です。
 */
export const WORD_BITS = 32;

/**
 * 1 ブロックあたりのワード数です。
 */
export const WORDS_PER_BLOCK = BLOCK_BITS / WORD_BITS;

/**
 * パディング済みのビット列の Valibot スキーマです。
 */
function PaddedBitStringSchema() {
  return singleton("segment__padded_bit_string", () => (
    v.pipe(
      BitStringSchema(),
      v.lengthMultiple(BLOCK_BITS),
    )
  ));
}

/**
 * パディング済みのビット列を 512 ビットのブロックに分割し、各ブロックを 16 個の 32 ビットワードにします。
 * 順序は保たれ、各ブロックのワードがそのままメッセージスケジュールの最初の 16 ワードになります。
 *
 * @param padded パディング済みのビット列です。
 * @returns ブロックごとの 16 ワードの配列です。
 */
export default function segment(padded: BitString): number[][] {
  const bits = v.expect(PaddedBitStringSchema(), padded);
  const blocks: number[][] = [];
  for (let offset = 0; offset < bits.length; offset += BLOCK_BITS) {
    const words: number[] = [];
    for (let i = 0; i < WORDS_PER_BLOCK; i++) {
      const start = offset + i * WORD_BITS;
      words.push(Number.parseInt(bits.slice(start, start + WORD_BITS), 2));
    }

    blocks.push(words);
  }

  return blocks;
}
