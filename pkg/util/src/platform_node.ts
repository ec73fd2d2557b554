import { Console } from "node:console";
import { createHash, timingSafeEqual as nodeTimingSafeEqual } from "node:crypto";

/** Console on stderr. */
export const console = new Console(process.stderr);

/** Timing-safe equality comparison. */
export function timingSafeEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.byteLength === b.byteLength && nodeTimingSafeEqual(a, b);
}

/** Compute SHA256 digest. */
export function sha256(input: Uint8Array): Uint8Array {
  return new Uint8Array(createHash("sha256").update(input).digest());
}
