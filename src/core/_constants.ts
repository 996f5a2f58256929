import singleton from "../shared/_singleton.js";
import type { Registers } from "../shared/tracer.js";

/**
 * 先頭から `count` 個の素数を、試し割りで求めます。
 *
 * @param count 求める素数の個数です。
 * @returns 昇順の素数の配列です。
 */
export function firstPrimes(count: number): number[] {
  const primes: number[] = [];
  for (let n = 2; primes.length < count; n++) {
    if (primes.every(p => n % p !== 0)) {
      primes.push(n);
    }
  }

  return primes;
}

/**
 * `value` の `degree` 乗根の整数部分 (床関数) を、ニュートン法で求めます。
 *
 * @param value 0 以上の整数です。
 * @param degree 2 以上の次数です。
 * @returns `x ** degree <= value` を満たす最大の整数 `x` です。
 */
export function integerRoot(value: bigint, degree: bigint): bigint {
  if (value < 2n) {
    return value;
  }

  // 真の値以上から始めると、単調に減少して床関数の値に収束します。
  let x = 1n << (BigInt(value.toString(2).length) / degree + 1n);
  for (;;) {
    const y = ((degree - 1n) * x + value / x ** (degree - 1n)) / degree;
    if (y >= x) {
      return x;
    }

    x = y;
  }
}

/**
 * 素数 `prime` の `degree` 乗根の小数部分の先頭 32 ビットを求めます。
 * 浮動小数点数の誤差を避けるため、`prime * 2^(32 * degree)` の整数乗根の下位 32 ビットとして計算します。
 *
 * @param prime 素数です。
 * @param degree 次数です。
 * @returns 32 ビットの符号なし整数です。
 */
function fractionalBits(prime: number, degree: bigint): number {
  return Number(integerRoot(BigInt(prime) << (32n * degree), degree) & 0xffff_ffffn);
}

/**
 * 64 個のラウンド定数 K を取得します。最初の 64 個の素数の立方根の小数部分です。
 *
 * @returns 凍結されたラウンド定数の配列です。
 */
export function roundConstants(): readonly number[] {
  return singleton("constants__round_constants", () => (
    Object.freeze(firstPrimes(64).map(p => fractionalBits(p, 3n)))
  ));
}

/**
 * ハッシュ値の初期値 H0 を取得します。最初の 8 個の素数の平方根の小数部分です。
 *
 * @returns 凍結された初期状態です。
 */
export function initialState(): Registers {
  return singleton("constants__initial_state", () => {
    const [a, b, c, d, e, f, g, h] = firstPrimes(8).map(p => fractionalBits(p, 2n));
    const state: Registers = [a, b, c, d, e, f, g, h];

    return Object.freeze(state);
  });
}
