import * as fs from "node:fs";
import * as path from "node:path";
import { EntryPathNotFoundError } from "../../../shared/errors.js";
import type { IFileSystem } from "../../../shared/file-system.js";
import isError from "../../../shared/is-error.js";
import * as v from "../../../shared/valibot.js";

/**
 * 例外が ENOENT エラーかどうかを判定します。
 *
 * @param ex 例外です。
 * @returns ENOENT エラーなら `true`、そうでなければ `false` です。
 */
function isEnoentError(ex: unknown): boolean {
  return (
    isError(ex)
    && "code" in ex
    && ex.code === "ENOENT"
  );
}

/**
 * ローカルファイルシステムの設定です。
 */
export type LocalFileSystemOptions = Readonly<{
  /**
   * 相対パスを解決する基準のディレクトリーです。
   * 指定しない場合は、読み込むたびにその時点のカレントディレクトリーを基準にします。
   */
  rootDir?: string | undefined;
}>;

/**
 * ローカルファイルシステムのファイルを同期的に読み込むファイルシステムです。
 */
export default class LocalFileSystem implements IFileSystem {
  /**
   * 相対パスを解決する基準のディレクトリーです。`undefined` ならカレントディレクトリーです。
   */
  public readonly rootDir: string | undefined;

  /**
   * `LocalFileSystem` クラスの新しいインスタンスを初期化します。
   *
   * @param options ローカルファイルシステムの設定です。
   */
  public constructor(options: LocalFileSystemOptions = {}) {
    const { rootDir } = options;
    this.rootDir = rootDir === undefined
      ? undefined
      : path.resolve(v.parse(v.string(), rootDir));
  }

  /**
   * ファイルを読み込みます。
   *
   * @param filePath ファイルのパスです。相対パスは `rootDir`、またはカレントディレクトリーを基準に解決されます。
   * @returns ファイルの内容です。
   * @throws ファイルが存在しない場合は `EntryPathNotFoundError` を投げます。
   */
  public readFile(filePath: string): Uint8Array {
    const fullPath = this.rootDir === undefined
      ? path.resolve(filePath)
      : path.resolve(this.rootDir, filePath);
    try {
      return new Uint8Array(fs.readFileSync(fullPath));
    } catch (ex) {
      if (isEnoentError(ex)) {
        throw new EntryPathNotFoundError(filePath, { cause: ex });
      }

      throw ex;
    }
  }
}
