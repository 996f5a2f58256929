/**
 * `file` 形式の入力を読み込むためのファイルシステムのインターフェースです。
 * ハッシュ計算は同期的に完了するため、読み込みも同期的に行います。
 */
export interface IFileSystem {
  /**
   * ファイルの内容をすべて読み込みます。
   *
   * @param path ファイルのパスです。
   * @returns ファイルの内容です。
   * @throws ファイルを開けない、または読み込めない場合は任意の例外を投げます。
   */
  readFile(path: string): Uint8Array;
}
