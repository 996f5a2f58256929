import Hasher from "../../../core/hasher.js";
import type { IFileSystem } from "../../../shared/file-system.js";
import type { ILogger } from "../../../shared/logger.js";
import type { ITracer } from "../../../shared/tracer.js";
import LocalFileSystem from "../file-system/local-file-system.js";
import getLogger from "./_get-logger.js";

/**
 * `createNodeHasher` のオプションです。
 */
export type CreateNodeHasherOptions = Readonly<{
  /**
   * ハッシュ計算の経過や、一括計算で失敗した入力を通知するロガーです。
   * 指定しない場合は環境変数からログレベルを決めた `ConsoleLogger` を使用します。
   */
  logger?: ILogger | undefined;

  /**
   * `file` 形式の入力を読み込むファイルシステムです。
   *
   * @default new LocalFileSystem({ rootDir })
   */
  fileSystem?: IFileSystem | undefined;

  /**
   * `fileSystem` を指定しなかったときに、相対パスを解決する基準のディレクトリーです。
   * 指定しない場合は、読み込むたびにその時点のカレントディレクトリーを基準にします。
   */
  rootDir?: string | undefined;

  /**
   * ハッシュ計算の途中経過を受け取るオブザーバーです。
   */
  tracer?: ITracer | undefined;
}>;

/**
 * - ランタイム: Node.js
 * - ファイルシステム: ローカル
 *
 * @param options オプションです。
 * @returns ハッシュ計算を行う `Hasher` です。
 */
export default function createNodeHasher(options: CreateNodeHasherOptions | undefined = {}): Hasher {
  const {
    logger,
    rootDir,
    fileSystem = new LocalFileSystem({ rootDir }),
    tracer,
  } = options;

  return new Hasher({
    logger: getLogger(logger),
    fileSystem,
    tracer,
  });
}
