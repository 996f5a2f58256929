import singleton from "./_singleton.js";

/**
 * UTF-8 のデコード時に再利用される共有 `TextDecoder` のインスタンスを取得します。
 *
 * @returns 共有の `TextDecoder` インスタンスです。
 */
function decoder(): TextDecoder {
  return singleton("utf8__decoder", () => (
    new TextDecoder("utf-8", {
      // 不正なバイト列は置換文字にせず、例外として扱います。
      fatal: true,
      // BOM も文字として残します。
      ignoreBOM: true,
    })
  ));
}

/**
 * UTF-8 のエンコード時に再利用される共有 `TextEncoder` のインスタンスを取得します。
 *
 * @returns 共有の `TextEncoder` インスタンスです。
 */
function encoder(): TextEncoder {
  return singleton("utf8__encoder", () => new TextEncoder());
}

/**
 * UTF-8 のエンコード・デコードを行うためのユーティリティーオブジェクトです。
 */
const utf8 = {
  /**
   * 引数として渡されたバッファーを UTF-8 の形式でデコードした文字列を返します。
   *
   * @param input エンコードされたテキストが入っているバッファーです。
   * @returns UTF-8 の形式でデコードされた文字列です。
   * @throws 不正な UTF-8 のバイト列であれば `TypeError` を投げます。
   */
  decode(input: Uint8Array): string {
    return decoder().decode(input);
  },

  /**
   * 引数として渡された文字列をエンコードして `Uint8Array` を返します。
   *
   * @param input エンコードするテキストが入った文字列です。
   * @returns エンコードされた `Uint8Array` です。
   */
  encode(input: string): Uint8Array {
    return encoder().encode(input);
  },
};

export default utf8;
