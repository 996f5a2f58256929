/**
 * エラーメッセージに埋め込む文字列の既定の最大長です。
 */
const DEFAULT_MAX_LENGTH = 80;

/**
 * 文字列を二重引用符で囲います。`maxLength` を超える部分は省略し、末尾に省略記号と元の長さを付けます。
 *
 * @param s 文字列です。
 * @param maxLength 省略せずに残す最大の文字数です。
 * @returns 二重引用符で囲まれた文字列です。
 */
export default function quoteString(s: string, maxLength: number = DEFAULT_MAX_LENGTH): string {
  if (s.length <= maxLength) {
    return JSON.stringify(s);
  }

  return JSON.stringify(s.slice(0, maxLength)) + `...(${s.length} chars)`;
}
