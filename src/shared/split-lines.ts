/**
 * パイプで渡されたテキストなどを行ごとに分割します。行末の `\n` と `\r\n` を区切りとし、最後の改行の後の空行は含めません。
 * 1 行ずつ別のメッセージとしてハッシュ値を計算する場合に使用します。
 *
 * @param text 分割するテキストです。
 * @returns 改行文字を含まない行の配列です。
 */
export default function splitLines(text: string): string[] {
  if (text === "") {
    return [];
  }

  const lines = text.split(/\r?\n/u);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }

  return lines;
}
