import { sha256 as referenceSha256 } from "hash-wasm";
import { describe, test } from "vitest";
import Digest from "../../src/core/digest.js";
import Hasher from "../../src/core/hasher.js";
import MemoryFileSystem from "../../src/envs/shared/file-system/memory-file-system.js";
import {
  DecimalTooLargeError,
  FileReadError,
  InvalidHexError,
  InvalidInputError,
  NotWholeBytesError,
} from "../../src/shared/errors.js";
import type { ILogger, LogEntry } from "../../src/shared/logger.js";
import { INT128_MAX } from "../../src/shared/schemas.js";
import type { BitsEvent, BlockEvent, DigestEvent, ITracer, RoundEvent } from "../../src/shared/tracer.js";

const ABC = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";
const EMPTY = "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";

class MemoryLogger implements ILogger {
  public entries: LogEntry[] = [];

  public log(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

class RecordingTracer implements ITracer {
  public bitsEvents: BitsEvent[] = [];
  public blockEvents: BlockEvent[] = [];
  public roundEvents: RoundEvent[] = [];
  public digestEvents: DigestEvent[] = [];

  public bits(event: BitsEvent): void {
    this.bitsEvents.push(event);
  }

  public block(event: BlockEvent): void {
    this.blockEvents.push(event);
  }

  public round(event: RoundEvent): void {
    this.roundEvents.push(event);
  }

  public digest(event: DigestEvent): void {
    this.digestEvents.push(event);
  }
}

describe("hash", () => {
  test.for([
    ["abc", ABC],
    ["", EMPTY],
    ["hello", "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824"],
    ["あ", "dc5a4d3d82f7e15792959dc661538ae0e541ce66494516f5c9cfd9cd3308494d"],
    ["a".repeat(1000), "41edece42d63e8d9bf515a9ba6932e1c20cbc9f5a5d134645adb5db1b9737ea3"],
  ] as const)("テキスト %j", ([message, expected], { expect }) => {
    const digest = new Hasher().hash(message);

    expect(digest).toBeInstanceOf(Digest);
    expect(digest.hex).toBe(expected);
  });

  test("ハッシュ値を 16 進数として再びハッシュできる", ({ expect }) => {
    const hasher = new Hasher();
    const once = hasher.hash("abc");

    expect(hasher.hash(once.hex, "hex").hex)
      .toBe("4f8b42c22dd3729b519ba6f68d2da7cc5b2d606d05daed5ad5128cc03e6c6358");
  });

  test("16 進数とリトルエンディアンの 16 進数", ({ expect }) => {
    const hasher = new Hasher();
    const expected = "039058c6f2c0cb492c533b0a4d14ef77cc0f78abccced5287d84a1a2011cfb81";

    expect(hasher.hash("010203", "hex").hex).toBe(expected);
    expect(hasher.hash("030201", "le-hex").hex).toBe(expected);
  });

  test("2 進数とリトルエンディアンの 2 進数", ({ expect }) => {
    const hasher = new Hasher();

    expect(hasher.hash("000000010000001000000011", "binary").hex)
      .toBe(hasher.hash("000000110000001000000001", "le-binary").hex);
  });

  test("バイト単位でない 2 進数", ({ expect }) => {
    expect(new Hasher().hash("101", "binary").hex)
      .toBe("36c2b2165533d184079d0431fdfa588021eff5cb79a6a6ad82d7d0377c81928b");
  });

  test("10 進数は最小の桁数の 2 進数としてハッシュする", ({ expect }) => {
    const hasher = new Hasher();

    expect(hasher.hash("5", "decimal").hex)
      .toBe("36c2b2165533d184079d0431fdfa588021eff5cb79a6a6ad82d7d0377c81928b");
    expect(hasher.hash("0", "decimal").hex)
      .toBe("bd4f9e98beb68c6ead3243b1b4c7fed75fa4feaab1f84795cbd8a98676a2a375");
    expect(hasher.hash("255", "decimal").hex).toBe(hasher.hash("ff", "hex").hex);
  });

  test("負の 10 進数は 128 ビットの 2 の補数としてハッシュする", ({ expect }) => {
    const hasher = new Hasher();

    expect(hasher.hash("-1", "decimal").hex)
      .toBe("5ac6a5945f16500911219129984ba8b387a06f24fe383ce4e81a73294065461b");
    expect(hasher.hash("-1", "decimal").hex).toBe(hasher.hash("f".repeat(32), "hex").hex);
  });

  test("10 進数の上限", ({ expect }) => {
    const hasher = new Hasher();

    expect(hasher.hash(INT128_MAX.toString(), "decimal").hex)
      .toBe("981735e416730ab73fd3d8b7cc0b4877e976dceb85304f1eaea4c1173d2cb940");
    expect(() => hasher.hash((INT128_MAX + 1n).toString(), "decimal")).toThrow(DecimalTooLargeError);
  });

  test("ファイルの内容をハッシュする", ({ expect }) => {
    const hasher = new Hasher({
      fileSystem: new MemoryFileSystem({ "dir/msg.txt": "abc" }),
    });

    expect(hasher.hash("dir/msg.txt", "file").hex).toBe(ABC);
  });

  test("ファイルシステムがなければ file 形式は FileReadError", ({ expect }) => {
    expect(() => new Hasher().hash("msg.txt", "file")).toThrow(FileReadError);
  });

  test("未知の形式は InvalidInputError", ({ expect }) => {
    expect(() => new Hasher().hash("abc", "base64" as never)).toThrow(InvalidInputError);
  });

  test("メッセージが文字列でなければ InvalidInputError", ({ expect }) => {
    expect(() => new Hasher().hash(1 as never)).toThrow(InvalidInputError);
  });

  test("ほかの実装と同じハッシュ値になる", async ({ expect }) => {
    const hasher = new Hasher();
    for (const length of [0, 1, 55, 56, 63, 64, 65, 119, 120, 128, 300]) {
      const message = Array.from({ length }, (_, i) => String.fromCharCode(0x20 + (i * 7) % 0x5f)).join("");

      expect(hasher.hash(message).hex).toBe(await referenceSha256(message));
    }
  });
});

describe("safeHash", () => {
  test("成功すると output にハッシュ値を持つ", ({ expect }) => {
    const result = new Hasher().safeHash("abc");

    expect(result.success).toBe(true);
    expect(result.success && result.output.hex).toBe(ABC);
  });

  test("HashError は投げずに error に持つ", ({ expect }) => {
    const result = new Hasher().safeHash("abc", "le-hex");

    expect(result.success).toBe(false);
    expect(result.success || result.error).toBeInstanceOf(NotWholeBytesError);
  });

  test("HashError でないエラーは投げる", ({ expect }) => {
    expect(() => new Hasher().safeHash("abc", "base64" as never)).toThrow(InvalidInputError);
  });
});

describe("hashEach", () => {
  test("失敗した入力があっても残りの入力を計算する", ({ expect }) => {
    const results = new Hasher().hashEach(["616263", "zz", ""], "hex");

    expect(results).toHaveLength(3);
    expect(results[0]?.success && results[0].output.hex).toBe(ABC);
    expect(results[1]?.success).toBe(false);
    expect(results[1]?.success === false && results[1].error).toBeInstanceOf(InvalidHexError);
    expect(results[2]?.success && results[2].output.hex).toBe(EMPTY);
  });

  test("失敗した入力を警告として記録する", ({ expect }) => {
    const logger = new MemoryLogger();
    const results = new Hasher({ logger }).hashEach(["ok", "ng"].values(), "decimal");
    const warnings = logger.entries.filter(entry => entry.level === 3);

    expect(warnings).toStrictEqual([
      {
        level: 3,
        reason: results[0]?.success === false ? results[0].error : undefined,
        message: "Hasher.hashEach: Failed to hash message #0",
      },
      {
        level: 3,
        reason: results[1]?.success === false ? results[1].error : undefined,
        message: "Hasher.hashEach: Failed to hash message #1",
      },
    ]);
  });

  test("空の入力では空の配列を返す", ({ expect }) => {
    expect(new Hasher().hashEach([])).toStrictEqual([]);
  });
});

describe("ロガー", () => {
  test("ハッシュ計算ごとにデバッグログを記録する", ({ expect }) => {
    const logger = new MemoryLogger();
    const hasher = new Hasher({ logger });
    hasher.hash("abc");
    hasher.hash("1".repeat(448), "binary");

    expect(logger.entries).toStrictEqual([
      {
        level: 1,
        message: "Hasher.hash: kind=text, bits=24, blocks=1",
      },
      {
        level: 1,
        message: "Hasher.hash: kind=binary, bits=448, blocks=2",
      },
    ]);
  });
});

describe("トレーサー", () => {
  test("途中経過を順に通知する", ({ expect }) => {
    const tracer = new RecordingTracer();
    new Hasher({ tracer }).hash("abc");

    expect(tracer.bitsEvents).toHaveLength(1);
    expect(tracer.bitsEvents[0]).toMatchObject({
      kind: "text",
      bits: "011000010110001001100011",
      blockCount: 1,
    });
    expect(tracer.bitsEvents[0]?.padded).toHaveLength(512);

    expect(tracer.blockEvents).toHaveLength(1);
    expect(tracer.blockEvents[0]?.index).toBe(0);
    expect(tracer.blockEvents[0]?.schedule.slice(0, 2)).toStrictEqual([0x61626380, 0]);
    expect(tracer.blockEvents[0]?.state[0]).toBe(0x6a09e667);
    expect(Object.isFrozen(tracer.blockEvents[0]?.schedule)).toBe(true);

    expect(tracer.roundEvents).toHaveLength(64);
    expect(tracer.roundEvents[0]).toMatchObject({ block: 0, round: 0, t1: 0x54da50e8, t2: 0x08909ae5 });
    expect(tracer.roundEvents[63]).toMatchObject({ block: 0, round: 63, k: 0xc67178f2 });

    expect(tracer.digestEvents).toHaveLength(1);
    expect(tracer.digestEvents[0]?.hex).toBe(ABC);
    expect(tracer.digestEvents[0]?.state[0]).toBe(0xba7816bf);
  });

  test("複数のブロックを番号付きで通知する", ({ expect }) => {
    const tracer = new RecordingTracer();
    new Hasher({ tracer }).hash("a".repeat(100));

    expect(tracer.blockEvents.map(e => e.index)).toStrictEqual([0, 1]);
    expect(tracer.roundEvents).toHaveLength(128);
    expect(tracer.roundEvents[64]).toMatchObject({ block: 1, round: 0 });
  });

  test("一部のメソッドだけを実装できる", ({ expect }) => {
    const rounds: number[] = [];
    const digest = new Hasher({ tracer: { round: e => rounds.push(e.round) } }).hash("abc");

    expect(digest.hex).toBe(ABC);
    expect(rounds).toHaveLength(64);
  });

  test("トレーサーは結果に影響しない", ({ expect }) => {
    const message = "a".repeat(100);

    expect(new Hasher({ tracer: new RecordingTracer() }).hash(message).hex)
      .toBe(new Hasher().hash(message).hex);
  });
});
