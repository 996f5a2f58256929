import singleton from "../shared/_singleton.js";
import utf8 from "../shared/_utf8.js";
import {
  DecimalTooLargeError,
  FileReadError,
  InvalidBinaryError,
  InvalidDecimalError,
  InvalidHexError,
  NotWholeBytesError,
} from "../shared/errors.js";
import type { IFileSystem } from "../shared/file-system.js";
import { InputKind } from "../shared/input-kind.js";
import {
  type BitString,
  BitStringSchema,
  DecimalStringSchema,
  HexStringSchema,
  INT128_MAX,
  INT128_MIN,
} from "../shared/schemas.js";
import unreachable from "../shared/unreachable.js";
import * as v from "../shared/valibot.js";
import reverseByteOrder from "./_reverse-byte-order.js";

/**
 * 1 バイトあたりの 2 進数の桁数です。
 */
const BINARY_DIGITS_PER_BYTE = 8;

/**
 * 1 バイトあたりの 16 進数の桁数です。
 */
const HEX_DIGITS_PER_BYTE = 2;

/**
 * 負の 10 進数を 2 の補数で表すときのビット数です。
 */
const DECIMAL_BITS = 128;

/**
 * 2 進数の文字列がバイト単位で区切れることを検証する Valibot スキーマです。
 */
function WholeBinaryBytesSchema() {
  return singleton("to_bits__whole_binary_bytes", () => (
    v.pipe(
      v.string(),
      v.lengthMultiple(BINARY_DIGITS_PER_BYTE),
    )
  ));
}

/**
 * 16 進数の文字列がバイト単位で区切れることを検証する Valibot スキーマです。
 */
function WholeHexBytesSchema() {
  return singleton("to_bits__whole_hex_bytes", () => (
    v.pipe(
      v.string(),
      v.lengthMultiple(HEX_DIGITS_PER_BYTE),
    )
  ));
}

/**
 * バイト列をビット列に変換します。各バイトは最上位ビットから順に 8 ビットになります。
 *
 * @param bytes バイト列です。
 * @returns ビット列です。
 */
function bytesToBits(bytes: Uint8Array): BitString {
  let bits = "";
  for (const byte of bytes) {
    bits += byte.toString(2).padStart(BINARY_DIGITS_PER_BYTE, "0");
  }

  return v.expect(BitStringSchema(), bits);
}

/**
 * 検証済みの 16 進数の文字列をビット列に変換します。各桁は 4 ビットになります。
 *
 * @param hex 16 進数の文字列です。
 * @returns ビット列です。
 */
function hexToBits(hex: string): BitString {
  let bits = "";
  for (const digit of hex) {
    bits += Number.parseInt(digit, 16).toString(2).padStart(4, "0");
  }

  return v.expect(BitStringSchema(), bits);
}

function textToBits(message: string): BitString {
  return bytesToBits(utf8.encode(message));
}

function binaryToBits(message: string): BitString {
  return v.parse(BitStringSchema(), message, InvalidBinaryError);
}

function leBinaryToBits(message: string): BitString {
  const bits = v.parse(BitStringSchema(), message, InvalidBinaryError);
  v.parse(WholeBinaryBytesSchema(), bits, NotWholeBytesError);

  return v.expect(BitStringSchema(), reverseByteOrder(bits, BINARY_DIGITS_PER_BYTE));
}

function hexStringToBits(message: string): BitString {
  return hexToBits(v.parse(HexStringSchema(), message, InvalidHexError));
}

function leHexToBits(message: string): BitString {
  // 桁数の検証を文字の検証より先に行います。
  v.parse(WholeHexBytesSchema(), message, NotWholeBytesError);
  const hex = v.parse(HexStringSchema(), message, InvalidHexError);

  return hexToBits(reverseByteOrder(hex, HEX_DIGITS_PER_BYTE));
}

function decimalToBits(message: string): BitString {
  const value = BigInt(v.parse(DecimalStringSchema(), message, InvalidDecimalError));
  if (value < INT128_MIN || INT128_MAX < value) {
    throw new DecimalTooLargeError(message, { min: INT128_MIN, max: INT128_MAX });
  }

  // 負の値は 128 ビットの 2 の補数で表します。
  const bits = (value < 0n ? BigInt.asUintN(DECIMAL_BITS, value) : value).toString(2);

  return v.expect(BitStringSchema(), bits);
}

function fileToBits(path: string, fileSystem: IFileSystem | undefined): BitString {
  if (!fileSystem) {
    throw new FileReadError(path, {
      cause: new TypeError("No file system is configured"),
    });
  }

  let text: string;
  try {
    text = utf8.decode(fileSystem.readFile(path));
  } catch (ex) {
    throw new FileReadError(path, { cause: ex });
  }

  return textToBits(text);
}

/**
 * メッセージをビット列に正規化する際の環境です。
 */
export type ToBitsContext = Readonly<{
  /**
   * `file` 形式の入力を読み込むファイルシステムです。
   */
  fileSystem?: IFileSystem | undefined;
}>;

/**
 * 指定された形式のメッセージを、最上位ビットが先頭のビット列に正規化します。
 *
 * @param message メッセージです。
 * @param kind メッセージの形式です。
 * @param context 正規化する際の環境です。
 * @returns ビット列です。
 */
export default function toBits(message: string, kind: InputKind, context: ToBitsContext = {}): BitString {
  switch (kind) {
    case InputKind.TEXT:
      return textToBits(message);

    case InputKind.BINARY:
      return binaryToBits(message);

    case InputKind.LE_BINARY:
      return leBinaryToBits(message);

    case InputKind.HEX:
      return hexStringToBits(message);

    case InputKind.LE_HEX:
      return leHexToBits(message);

    case InputKind.DECIMAL:
      return decimalToBits(message);

    case InputKind.FILE:
      return fileToBits(message, context.fileSystem);

    default:
      unreachable(kind);
  }
}
