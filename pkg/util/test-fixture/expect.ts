import { expect } from "vitest";

import { toHex } from "..";

function toEqualUint8Array(received: Uint8Array, expected: Uint8Array) {
  const pass = Buffer.compare(received, expected) === 0;
  return {
    message: () => `expected ${toHex(received)} ${pass ? "not " : ""}to equal ${toHex(expected)}`,
    pass,
  };
}

expect.extend({
  toEqualUint8Array,
});

interface CustomMatchers<R = unknown> {
  toEqualUint8Array: (expected: Uint8Array) => R;
}

declare module "vitest" {
  interface Assertion<T = any> extends CustomMatchers<T> {}
  interface AsymmetricMatchersContaining extends CustomMatchers {}
}
