import type { InputKind } from "./input-kind.js";
import type { BitString, DigestHex } from "./schemas.js";

/**
 * 8 つの 32 ビットレジスター (a, b, c, d, e, f, g, h) の値です。
 */
export type Registers = readonly [
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number,
  g: number,
  h: number,
];

/**
 * 入力をビット列に正規化し、パディングした直後に通知される内容です。
 */
export type BitsEvent = Readonly<{
  /**
   * 入力メッセージの形式です。
   */
  kind: InputKind;

  /**
   * 正規化されたメッセージのビット列です。
   */
  bits: BitString;

  /**
   * パディングされたビット列です。
   */
  padded: BitString;

  /**
   * 512 ビットのブロックの数です。
   */
  blockCount: number;
}>;

/**
 * ブロックの圧縮を始める直前に通知される内容です。
 */
export type BlockEvent = Readonly<{
  /**
   * 0 から始まるブロックの番号です。
   */
  index: number;

  /**
   * 拡張されたメッセージスケジュール (64 ワード) です。
   */
  schedule: readonly number[];

  /**
   * このブロックに入る前の内部状態です。
   */
  state: Registers;
}>;

/**
 * 圧縮関数の 1 ラウンドが終わるたびに通知される内容です。
 */
export type RoundEvent = Readonly<{
  /**
   * 0 から始まるブロックの番号です。
   */
  block: number;

  /**
   * 0 から 63 までのラウンドの番号です。
   */
  round: number;

  /**
   * このラウンドで使われたラウンド定数です。
   */
  k: number;

  /**
   * このラウンドで使われたメッセージスケジュールのワードです。
   */
  w: number;

  /**
   * 一時変数 T1 です。
   */
  t1: number;

  /**
   * 一時変数 T2 です。
   */
  t2: number;

  /**
   * ラウンド終了後の作業変数です。
   */
  registers: Registers;
}>;

/**
 * すべてのブロックを処理し終えた後に通知される内容です。
 */
export type DigestEvent = Readonly<{
  /**
   * 最終的な内部状態です。
   */
  state: Registers;

  /**
   * ハッシュ値の 16 進数文字列です。
   */
  hex: DigestHex;
}>;

/**
 * ハッシュ計算の途中経過を受け取るオブザーバーのインターフェースです。
 * 可視化などの表示のためだけに使用され、計算結果には影響しません。必要なメソッドだけを実装できます。
 */
export interface ITracer {
  /**
   * 入力がビット列に正規化され、パディングされたときに呼び出されます。
   *
   * @param event 通知される内容です。
   */
  bits?(event: BitsEvent): void;

  /**
   * ブロックの圧縮を始める直前に呼び出されます。
   *
   * @param event 通知される内容です。
   */
  block?(event: BlockEvent): void;

  /**
   * 圧縮関数の各ラウンドの後に呼び出されます。
   *
   * @param event 通知される内容です。
   */
  round?(event: RoundEvent): void;

  /**
   * ハッシュ値が確定したときに呼び出されます。
   *
   * @param event 通知される内容です。
   */
  digest?(event: DigestEvent): void;
}
