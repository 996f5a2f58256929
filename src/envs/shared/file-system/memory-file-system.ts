import utf8 from "../../../shared/_utf8.js";
import { EntryPathNotFoundError } from "../../../shared/errors.js";
import type { IFileSystem } from "../../../shared/file-system.js";
import * as v from "../../../shared/valibot.js";

/**
 * パスを `/` で区切られたセグメントに正規化します。空のセグメントと `.` は取り除かれます。
 *
 * @param path パスです。
 * @returns 正規化されたパスです。
 */
function normalizePath(path: string): string {
  return v.parse(v.string(), path)
    .split("/")
    .filter(segment => segment !== "" && segment !== ".")
    .join("/");
}

/**
 * メモリー上にファイルを保持するファイルシステムです。テストや、ローカルのファイルシステムがない環境で使用します。
 */
export default class MemoryFileSystem implements IFileSystem {
  /**
   * 正規化されたパスとファイルの内容の対応表です。
   */
  readonly #files: Map<string, Uint8Array>;

  /**
   * `MemoryFileSystem` クラスの新しいインスタンスを初期化します。
   *
   * @param files 最初から存在するファイルです。文字列は UTF-8 でエンコードされます。
   */
  public constructor(files: Readonly<Record<string, string | Uint8Array>> = {}) {
    this.#files = new Map();
    for (const [path, data] of Object.entries(files)) {
      this.writeFile(path, data);
    }
  }

  /**
   * ファイルを書き込みます。同じパスのファイルがあれば上書きします。
   *
   * @param path ファイルのパスです。
   * @param data ファイルの内容です。文字列は UTF-8 でエンコードされます。
   */
  public writeFile(path: string, data: string | Uint8Array): void {
    this.#files.set(
      normalizePath(path),
      typeof data === "string" ? utf8.encode(data) : data.slice(),
    );
  }

  /**
   * ファイルを読み込みます。
   *
   * @param path ファイルのパスです。
   * @returns ファイルの内容のコピーです。
   * @throws ファイルが存在しない場合は `EntryPathNotFoundError` を投げます。
   */
  public readFile(path: string): Uint8Array {
    const data = this.#files.get(normalizePath(path));
    if (data === undefined) {
      throw new EntryPathNotFoundError(path);
    }

    return data.slice();
  }
}
