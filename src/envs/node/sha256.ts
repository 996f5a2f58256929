import type Digest from "../../core/digest.js";
import type { SafeHashResult } from "../../core/hasher.js";
import singleton from "../../shared/_singleton.js";
import type { InputKindLike } from "../../shared/input-kind.js";
import createNodeHasher, { type CreateNodeHasherOptions } from "./setup/create-node-hasher.js";

/**
 * オプションを指定しなかったときに共有される `Hasher` を取得します。
 */
function defaultHasher() {
  return singleton("sha256__default_hasher", () => createNodeHasher());
}

/**
 * `options` が指定されていれば新しい `Hasher` を、そうでなければ共有の `Hasher` を返します。
 */
function getHasher(options: CreateNodeHasherOptions | undefined) {
  return options === undefined ? defaultHasher() : createNodeHasher(options);
}

/**
 * メッセージの SHA-256 のハッシュ値を計算します。
 *
 * @param message メッセージです。
 * @param kind メッセージの形式です。
 * @param options `Hasher` のオプションです。
 * @returns ハッシュ値です。
 * @throws メッセージを解釈できない場合は `HashError` を投げます。
 * @example
 * ```ts
 * const digest = sha256("48656c6c6f", "hex");
 * ```
 */
export function sha256(
  message: string,
  kind: InputKindLike = "text",
  options?: CreateNodeHasherOptions | undefined,
): Digest {
  return getHasher(options).hash(message, kind);
}

/**
 * メッセージの SHA-256 のハッシュ値を計算します。`HashError` は投げずに結果として返します。
 *
 * @param message メッセージです。
 * @param kind メッセージの形式です。
 * @param options `Hasher` のオプションです。
 * @returns ハッシュ計算の結果です。
 */
export function safeSha256(
  message: string,
  kind: InputKindLike = "text",
  options?: CreateNodeHasherOptions | undefined,
): SafeHashResult {
  return getHasher(options).safeHash(message, kind);
}
