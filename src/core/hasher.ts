import VoidLogger from "../envs/shared/logger/void-logger.js";
import { type HashError, isHashError } from "../shared/errors.js";
import type { IFileSystem } from "../shared/file-system.js";
import { type InputKindLike, InputKindSchema } from "../shared/input-kind.js";
import { type ILogger, LogLevel } from "../shared/logger.js";
import type { ITracer, Registers } from "../shared/tracer.js";
import * as v from "../shared/valibot.js";
import { compress, expandSchedule } from "./_compress.js";
import { initialState } from "./_constants.js";
import pad from "./_pad.js";
import segment from "./_segment.js";
import toBits from "./_to-bits.js";
import Digest from "./digest.js";

/**
 * `Hasher` の設定です。
 */
export type HasherOptions = Readonly<{
  /**
   * ハッシュ計算の経過や、一括計算で失敗した入力を通知するロガーです。
   *
   * @default new VoidLogger()
   */
  logger?: ILogger | undefined;

  /**
   * `file` 形式の入力を読み込むファイルシステムです。指定しない場合、`file` 形式の入力は `FileReadError` になります。
   */
  fileSystem?: IFileSystem | undefined;

  /**
   * ハッシュ計算の途中経過を受け取るオブザーバーです。
   */
  tracer?: ITracer | undefined;
}>;

/**
 * 例外を投げずにハッシュ計算した結果です。
 */
export type SafeHashResult =
  | {
    success: true;
    output: Digest;
  }
  | {
    success: false;
    error: HashError;
  };

/**
 * メッセージから SHA-256 のハッシュ値を計算します。
 *
 * @example
 * ```ts
 * const hasher = new Hasher();
 * const digest = hasher.hash("abc");
 *
 * console.log(digest.hex);
 * // ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad
 * ```
 */
export default class Hasher {
  readonly #logger: ILogger;

  readonly #fileSystem: IFileSystem | undefined;

  readonly #tracer: ITracer | undefined;

  /**
   * `Hasher` クラスの新しいインスタンスを初期化します。
   *
   * @param options `Hasher` の設定です。
   */
  public constructor(options: HasherOptions = {}) {
    const {
      logger = new VoidLogger(),
      fileSystem,
      tracer,
    } = options;
    this.#logger = logger;
    this.#fileSystem = fileSystem;
    this.#tracer = tracer;
  }

  /**
   * メッセージのハッシュ値を計算します。
   *
   * @param message メッセージです。
   * @param kind メッセージの形式です。
   * @returns ハッシュ値です。
   * @throws メッセージを解釈できない場合は `HashError` を投げます。
   */
  public hash(message: string, kind: InputKindLike = "text"): Digest {
    const inputKind = v.parse(InputKindSchema(), kind);
    const text = v.parse(v.string(), message);
    const tracer = this.#tracer;

    const bits = toBits(text, inputKind, { fileSystem: this.#fileSystem });
    const padded = pad(bits);
    const blocks = segment(padded);
    this.#logger.log({
      level: LogLevel.DEBUG,
      message: `Hasher.hash: kind=${inputKind}, bits=${bits.length}, blocks=${blocks.length}`,
    });
    tracer?.bits?.({
      kind: inputKind,
      bits,
      padded,
      blockCount: blocks.length,
    });

    let state: Registers = initialState();
    for (const [index, words] of blocks.entries()) {
      const schedule = expandSchedule(words);
      tracer?.block?.({
        index,
        schedule: Object.freeze([...schedule]),
        state,
      });
      const onRound = tracer?.round;
      state = compress(
        state,
        schedule,
        onRound && (event => onRound.call(tracer, { block: index, ...event })),
      );
    }

    const digest = Digest.fromState(state);
    tracer?.digest?.({
      state,
      hex: digest.hex,
    });

    return digest;
  }

  /**
   * メッセージのハッシュ値を計算します。`HashError` は投げずに結果として返します。
   *
   * @param message メッセージです。
   * @param kind メッセージの形式です。
   * @returns ハッシュ計算の結果です。
   */
  public safeHash(message: string, kind: InputKindLike = "text"): SafeHashResult {
    try {
      return {
        success: true,
        output: this.hash(message, kind),
      };
    } catch (ex) {
      if (isHashError(ex)) {
        return {
          success: false,
          error: ex,
        };
      }

      throw ex;
    }
  }

  /**
   * 複数のメッセージのハッシュ値を順番に計算します。失敗したメッセージがあっても残りのメッセージの計算を続けます。
   *
   * @param messages メッセージの並びです。
   * @param kind すべてのメッセージに共通する形式です。
   * @returns メッセージと同じ順序の、ハッシュ計算の結果の配列です。
   */
  public hashEach(messages: Iterable<string>, kind: InputKindLike = "text"): SafeHashResult[] {
    const results: SafeHashResult[] = [];
    for (const message of messages) {
      const result = this.safeHash(message, kind);
      if (!result.success) {
        this.#logger.log({
          level: LogLevel.WARN,
          reason: result.error,
          message: `Hasher.hashEach: Failed to hash message #${results.length}`,
        });
      }

      results.push(result);
    }

    return results;
  }
}
