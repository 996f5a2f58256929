import { InvalidHashError } from "../shared/errors.js";
import {
  type DigestHex,
  DigestHexSchema,
  HashStateSchema,
  type Uint256,
  Uint256Schema,
} from "../shared/schemas.js";
import type { Registers } from "../shared/tracer.js";
import * as v from "../shared/valibot.js";
import reverseByteOrder from "./_reverse-byte-order.js";

/**
 * SHA-256 のハッシュ値です。64 桁の 16 進数文字列を保持する不変な値です。
 */
export default class Digest {
  /**
   * 16 進数文字列からハッシュ値を作成します。
   *
   * @param hex 64 桁の 16 進数文字列です。大文字と小文字のどちらも受け付けます。
   * @param littleEndian `hex` のバイト順が逆 (リトルエンディアン) であれば `true` です。
   * @returns ハッシュ値です。
   * @throws 64 桁の 16 進数文字列でなければ `InvalidHashError` を投げます。
   */
  public static fromHex(hex: string, littleEndian: boolean = false): Digest {
    const text = v.parse(DigestHexSchema(), hex, InvalidHashError);

    return new Digest(littleEndian ? reverseByteOrder(text, 2) : text);
  }

  /**
   * 最終的な内部状態からハッシュ値を作成します。各ワードを 8 桁の小文字の 16 進数にして a から h の順に連結します。
   *
   * @param state 8 つのワードからなる内部状態です。
   * @returns ハッシュ値です。
   */
  public static fromState(state: Registers): Digest {
    const words = v.expect(HashStateSchema(), state);

    return new Digest(words.map(w => w.toString(16).padStart(8, "0")).join(""));
  }

  /**
   * 16 進数文字列です。
   */
  readonly #hex: DigestHex;

  /**
   * `Digest` クラスの新しいインスタンスを初期化します。
   *
   * @param hex 64 桁の 16 進数文字列です。
   */
  public constructor(hex: string) {
    this.#hex = v.parse(DigestHexSchema(), hex, InvalidHashError);
    Object.freeze(this);
  }

  /**
   * ビッグエンディアンの 16 進数文字列です。作成時に与えられた文字列をそのまま返します。
   */
  public get hex(): DigestHex {
    return this.#hex;
  }

  /**
   * バイト順を逆にした (リトルエンディアンの) 16 進数文字列です。
   */
  public get hexLE(): DigestHex {
    return v.expect(DigestHexSchema(), reverseByteOrder(this.#hex, 2));
  }

  /**
   * ハッシュ値を 0 以上の整数に変換します。
   *
   * @returns 整数です。
   */
  public toBigInt(): bigint {
    return BigInt("0x" + this.#hex);
  }

  /**
   * ハッシュ値を符号なし 256 ビット整数に変換します。
   *
   * @returns 符号なし 256 ビット整数です。
   */
  public toBigUint(): Uint256 {
    return v.expect(Uint256Schema(), this.toBigInt());
  }

  /**
   * ハッシュ値を 32 バイトのバイト列に変換します。呼び出すたびに新しい配列を返します。
   *
   * @returns バイト列です。
   */
  public bytes(): Uint8Array {
    const bytes = new Uint8Array(this.#hex.length / 2);
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = Number.parseInt(this.#hex.slice(i * 2, i * 2 + 2), 16);
    }

    return bytes;
  }

  /**
   * 別のハッシュ値と等しいかどうかを判定します。大文字と小文字は区別しません。
   *
   * @param other 比較するハッシュ値、または 16 進数文字列です。
   * @returns 等しければ `true`、そうでなければ `false` です。
   */
  public equals(other: Digest | string): boolean {
    const hex = other instanceof Digest ? other.hex : other;

    return this.#hex.toLowerCase() === hex.toLowerCase();
  }

  public toString(): string {
    return this.#hex;
  }

  public toJSON(): string {
    return this.#hex;
  }
}
