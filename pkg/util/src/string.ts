const INT2HEX: string[] = [];
for (let b = 0; b <= 0xFF; ++b) {
  INT2HEX.push(b.toString(16).padStart(2, "0").toUpperCase());
}

/** Convert byte array to upper-case hexadecimal string. */
export function toHex(buf: Uint8Array): string {
  let s = "";
  for (const b of buf) {
    s += INT2HEX[b];
  }
  return s;
}

/**
 * Convert hexadecimal string to byte array.
 *
 * @throws Error
 * Thrown if the input is not an even-length hexadecimal string.
 */
export function fromHex(s: string): Uint8Array {
  if (!/^(?:[\dA-Fa-f]{2})*$/.test(s)) {
    throw new Error("invalid hexadecimal string");
  }
  return new Uint8Array(Buffer.from(s, "hex"));
}

/** Convert byte array to base64 string. */
export function toBase64(buf: Uint8Array): string {
  return Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength).toString("base64");
}

/**
 * Convert base64 string to byte array.
 * Whitespace is ignored.
 */
export function fromBase64(s: string): Uint8Array {
  return new Uint8Array(Buffer.from(s.replaceAll(/\s/g, ""), "base64"));
}

/** Convert UTF-8 byte array to string. */
export function fromUtf8(buf: Uint8Array): string {
  return Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength).toString("utf8");
}
