import "../test-fixture/expect";

import { expect, test } from "vitest";

import { fromBase64, fromHex, fromUtf8, toBase64, toHex } from "..";

test("hex", () => {
  expect(toHex(Uint8Array.of(0x00, 0x0F, 0xA0, 0xFF))).toBe("000FA0FF");
  expect(toHex(new Uint8Array())).toBe("");
  expect(fromHex("000fa0FF")).toEqualUint8Array(Uint8Array.of(0x00, 0x0F, 0xA0, 0xFF));
  expect(() => fromHex("ABC")).toThrow(/hexadecimal/);
  expect(() => fromHex("GG")).toThrow(/hexadecimal/);
});

test("base64", () => {
  const b = Uint8Array.of(0xFB, 0xFF, 0x00, 0x41);
  expect(toBase64(b)).toBe("+/8AQQ==");
  expect(toBase64(new Uint8Array(b.buffer, 1, 2))).toBe("/wA=");
  expect(fromBase64("+/8A\nQQ==")).toEqualUint8Array(b);
});

test("utf8", () => {
  expect(fromUtf8(Uint8Array.of(0x41, 0xC3, 0xA9))).toBe("Aé");
});
