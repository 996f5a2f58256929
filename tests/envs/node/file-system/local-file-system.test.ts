import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, test } from "vitest";
import LocalFileSystem from "../../../../src/envs/node/file-system/local-file-system.js";
import { EntryPathNotFoundError } from "../../../../src/shared/errors.js";

let rootDir: string;

beforeEach(() => {
  rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "bitsha-"));
});

afterEach(() => {
  fs.rmSync(rootDir, { recursive: true, force: true });
});

describe("readFile", () => {
  test("rootDir を基準に相対パスを解決する", ({ expect }) => {
    fs.writeFileSync(path.join(rootDir, "a.txt"), "abc");
    const lfs = new LocalFileSystem({ rootDir });

    expect([...lfs.readFile("a.txt")]).toStrictEqual([0x61, 0x62, 0x63]);
  });

  test("rootDir がなければ読み込む時点のカレントディレクトリーを基準にする", ({ expect }) => {
    const cwd = process.cwd();
    const dirA = path.join(rootDir, "a");
    const dirB = path.join(rootDir, "b");
    fs.mkdirSync(dirA);
    fs.mkdirSync(dirB);
    fs.writeFileSync(path.join(dirA, "m.txt"), "abc");
    fs.writeFileSync(path.join(dirB, "m.txt"), "hello");
    const lfs = new LocalFileSystem();

    try {
      process.chdir(dirA);
      expect(lfs.readFile("m.txt")).toHaveLength(3);
      process.chdir(dirB);
      expect(lfs.readFile("m.txt")).toHaveLength(5);
    } finally {
      process.chdir(cwd);
    }
  });

  test("絶対パスはそのまま使う", ({ expect }) => {
    const filePath = path.join(rootDir, "a.txt");
    fs.writeFileSync(filePath, "abc");
    const lfs = new LocalFileSystem({ rootDir: os.tmpdir() });

    expect(lfs.readFile(filePath)).toHaveLength(3);
  });

  test("Uint8Array を返す", ({ expect }) => {
    fs.writeFileSync(path.join(rootDir, "a.txt"), "abc");
    const bytes = new LocalFileSystem({ rootDir }).readFile("a.txt");

    expect(bytes).toBeInstanceOf(Uint8Array);
    expect(Buffer.isBuffer(bytes)).toBe(false);
  });

  test("存在しないファイルは EntryPathNotFoundError", ({ expect }) => {
    const lfs = new LocalFileSystem({ rootDir });

    expect(() => lfs.readFile("missing.txt")).toThrow(EntryPathNotFoundError);
  });

  test("その他の失敗は元の例外をそのまま投げる", ({ expect }) => {
    fs.mkdirSync(path.join(rootDir, "dir"));
    const lfs = new LocalFileSystem({ rootDir });

    try {
      lfs.readFile("dir");
      expect.unreachable();
    } catch (ex) {
      expect(ex).not.toBeInstanceOf(EntryPathNotFoundError);
      expect(ex).toHaveProperty("code", "EISDIR");
    }
  });
});
