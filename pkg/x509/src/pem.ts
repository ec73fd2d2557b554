import { fromBase64, toBase64 } from "@certpin/util";

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----([\s\S]*?)-----END CERTIFICATE-----/g;

/** Determine whether text (or bytes read from a file) contains PEM certificate blocks. */
export function isPem(input: string | Uint8Array): boolean {
  const text = typeof input === "string" ? input : Buffer.from(input.subarray(0, 4096)).toString("latin1");
  return text.includes("-----BEGIN CERTIFICATE-----");
}

/**
 * Extract DER certificates from PEM text.
 * @returns DER encoding of every CERTIFICATE block, in order of appearance.
 * Blocks of other types are ignored.
 */
export function decodePem(text: string): Uint8Array[] {
  return Array.from(text.matchAll(PEM_CERTIFICATE), ([, body = ""]) => fromBase64(body));
}

/** Encode a DER certificate as a PEM CERTIFICATE block. */
export function encodePem(der: Uint8Array): string {
  const b64 = toBase64(der);
  const lines = ["-----BEGIN CERTIFICATE-----"];
  for (let i = 0; i < b64.length; i += 64) {
    lines.push(b64.slice(i, i + 64));
  }
  lines.push("-----END CERTIFICATE-----", "");
  return lines.join("\n");
}
