import type { Registers, RoundEvent } from "../shared/tracer.js";
import { roundConstants } from "./_constants.js";

/**
 * メッセージスケジュールのワード数であり、圧縮関数のラウンド数です。
 */
export const ROUNDS = 64;

/**
 * 32 ビットのワードを右に `n` ビット回転します。
 *
 * @param x ワードです。
 * @param n 回転するビット数です。
 * @returns 回転したワードです。
 */
export function rotr(x: number, n: number): number {
  return ((x >>> n) | (x << (32 - n))) >>> 0;
}

/**
 * ワードを 2^32 を法として足し合わせます。
 *
 * @param words ワードです。
 * @returns 和です。
 */
export function add(...words: number[]): number {
  let sum = 0;
  for (const w of words) {
    sum = (sum + w) >>> 0;
  }

  return sum;
}

export function smallSigma0(x: number): number {
  return (rotr(x, 7) ^ rotr(x, 18) ^ (x >>> 3)) >>> 0;
}

export function smallSigma1(x: number): number {
  return (rotr(x, 17) ^ rotr(x, 19) ^ (x >>> 10)) >>> 0;
}

export function bigSigma0(x: number): number {
  return (rotr(x, 2) ^ rotr(x, 13) ^ rotr(x, 22)) >>> 0;
}

export function bigSigma1(x: number): number {
  return (rotr(x, 6) ^ rotr(x, 11) ^ rotr(x, 25)) >>> 0;
}

/**
 * `x` の各ビットで `y` と `z` のどちらのビットを採るかを選びます。
 */
export function choice(x: number, y: number, z: number): number {
  return ((x & y) ^ (~x & z)) >>> 0;
}

/**
 * 各ビットの多数決をとります。
 */
export function majority(x: number, y: number, z: number): number {
  return ((x & y) ^ (x & z) ^ (y & z)) >>> 0;
}

/**
 * 16 ワードのブロックを 64 ワードのメッセージスケジュールに拡張します。
 *
 * @param words ブロックを構成する 16 個のワードです。
 * @returns メッセージスケジュールです。
 */
export function expandSchedule(words: readonly number[]): number[] {
  const w = words.slice(0, 16);
  for (let i = 16; i < ROUNDS; i++) {
    w.push(add(smallSigma1(w[i - 2]), w[i - 7], smallSigma0(w[i - 15]), w[i - 16]));
  }

  return w;
}

/**
 * ラウンドの終了ごとに呼び出される関数です。ブロックの番号は呼び出し元が補います。
 */
export type RoundCallback = (event: Omit<RoundEvent, "block">) => void;

/**
 * 1 ブロック分の圧縮関数を適用し、更新された内部状態を返します。
 *
 * @param state このブロックに入る前の内部状態です。
 * @param schedule メッセージスケジュールです。
 * @param onRound ラウンドの終了ごとに呼び出される関数です。
 * @returns 凍結された新しい内部状態です。
 */
export function compress(
  state: Registers,
  schedule: readonly number[],
  onRound?: RoundCallback | undefined,
): Registers {
  const k = roundConstants();
  let [a, b, c, d, e, f, g, h] = state;

  for (let i = 0; i < ROUNDS; i++) {
    const t1 = add(bigSigma1(e), choice(e, f, g), h, k[i], schedule[i]);
    const t2 = add(bigSigma0(a), majority(a, b, c));
    h = g;
    g = f;
    f = e;
    e = add(d, t1);
    d = c;
    c = b;
    b = a;
    a = add(t1, t2);

    if (onRound) {
      const registers: Registers = [a, b, c, d, e, f, g, h];
      onRound({ round: i, k: k[i], w: schedule[i], t1, t2, registers: Object.freeze(registers) });
    }
  }

  const next: Registers = [
    add(state[0], a),
    add(state[1], b),
    add(state[2], c),
    add(state[3], d),
    add(state[4], e),
    add(state[5], f),
    add(state[6], g),
    add(state[7], h),
  ];

  return Object.freeze(next);
}
