/**
 * 数字の列を `digitsPerByte` 桁ずつのバイトに区切り、バイトの並びを逆順にします。各バイトの中の桁の並びは変えません。
 * ビッグエンディアンとリトルエンディアンの表記を相互に変換します。逆順にする操作は 2 回行うと元に戻ります。
 *
 * `digits` の長さは `digitsPerByte` の倍数である必要があります。
 *
 * @param digits 2 進数または 16 進数の数字の列です。
 * @param digitsPerByte 1 バイトあたりの桁数です。2 進数なら 8、16 進数なら 2 です。
 * @returns バイト順を逆にした新しい文字列です。
 */
export default function reverseByteOrder(digits: string, digitsPerByte: number): string {
  const bytes: string[] = [];
  for (let end = digits.length; end > 0; end -= digitsPerByte) {
    bytes.push(digits.slice(end - digitsPerByte, end));
  }

  return bytes.join("");
}
