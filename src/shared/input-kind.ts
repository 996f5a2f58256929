import singleton from "./_singleton.js";
import * as v from "./valibot.js";

/**
 * 入力メッセージの形式の型定義です。
 */
export type InputKind = (typeof InputKind)[keyof typeof InputKind];

/**
 * 入力メッセージの形式を定義する定数です。
 */
export const InputKind = {
  /**
   * UTF-8 のテキストです。
   */
  TEXT: "text",

  /**
   * `'0'` と `'1'` からなる 2 進数です。
   */
  BINARY: "binary",

  /**
   * バイト順が逆 (リトルエンディアン) の 2 進数です。
   */
  LE_BINARY: "le-binary",

  /**
   * 16 進数です。
   */
  HEX: "hex",

  /**
   * バイト順が逆 (リトルエンディアン) の 16 進数です。
   */
  LE_HEX: "le-hex",

  /**
   * 符号付き 128 ビット整数の範囲の 10 進数です。
   */
  DECIMAL: "decimal",

  /**
   * ファイルのパスです。ファイルの内容を UTF-8 のテキストとして扱います。
   */
  FILE: "file",
} as const;

/**
 * 入力メッセージの形式の Valibot スキーマです。
 */
export function InputKindSchema() {
  return singleton("input_kind__input_kind", () => (
    v.picklist([
      InputKind.TEXT,
      InputKind.BINARY,
      InputKind.LE_BINARY,
      InputKind.HEX,
      InputKind.LE_HEX,
      InputKind.DECIMAL,
      InputKind.FILE,
    ])
  ));
}

/**
 * 入力メッセージの形式になれる値です。
 */
export type InputKindLike = v.InferInput<ReturnType<typeof InputKindSchema>>;
