import { test } from "vitest";
import { InvalidInputError } from "../../src/shared/errors.js";
import { InputKind, InputKindSchema } from "../../src/shared/input-kind.js";
import * as v from "../../src/shared/valibot.js";

test("入力形式は 7 種類", ({ expect }) => {
  expect(Object.values(InputKind)).toStrictEqual([
    "text",
    "binary",
    "le-binary",
    "hex",
    "le-hex",
    "decimal",
    "file",
  ]);
});

test("すべての入力形式をスキーマが受け付ける", ({ expect }) => {
  for (const kind of Object.values(InputKind)) {
    expect(v.parse(InputKindSchema(), kind)).toBe(kind);
  }
});

test("未知の形式は InvalidInputError になる", ({ expect }) => {
  expect(() => v.parse(InputKindSchema(), "base64")).toThrow(InvalidInputError);
  expect(() => v.parse(InputKindSchema(), "TEXT")).toThrow(InvalidInputError);
});
