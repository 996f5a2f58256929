declare global {
  /**
   * 一度だけ実行される関数の結果をキャッシュするためのグローバル変数です。
   */
  var bitsha__singleton: Map<unknown, unknown> | undefined;
}

/**
 * 一度だけ実行されることを保証する関数です。`key` に紐づく関数 `fn` の実行結果をキャッシュし、同じ `key` で複数回呼び出された
 * 場合でも、関数が再度実行されることなくキャッシュされた結果を返します。関数 `fn` が例外を投げた場合は何もキャッシュしません。
 *
 * ラウンド定数や Valibot のスキーマなど、プロセス全体で共有される読み取り専用の値の生成に使用します。
 *
 * @template T 実行する関数の返り値の型です。
 * @param key キャッシュを一意に識別するための識別子です。
 * @param fn 一度だけ実行したい関数です。
 * @returns 関数 `fn` の実行結果です。
 */
export default function singleton<T>(key: string, fn: () => T): T {
  const cache = globalThis.bitsha__singleton ||= new Map<unknown, unknown>();
  if (cache.has(key)) {
    return cache.get(key) as T;
  }

  const value = fn();
  cache.set(key, value);

  return value;
}
