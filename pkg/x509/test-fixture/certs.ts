import fs from "node:fs";

import { Certificate, extractSpki } from "..";

/**
 * Certificates generated by `certs/generate.sh`, all ECDSA P-256.
 *
 * @remarks
 * - root, other-root: self-signed CAs.
 * - intermediate: CA issued by root.
 * - leaf, leaf-rotated, leaf-expired: issued by intermediate, same key "K", example.com.
 * - attacker, attacker-expired: issued by intermediate, key "K'", example.com.
 * - self-signed: pinned.test and 127.0.0.1, not a CA.
 * - cn-only: issued by intermediate, CN=cn.test without SubjectAltName.
 * - Expired certificates ended on 2021-01-01; all others are valid from 2024 to 2100.
 */
export type FixtureName =
  "root" | "other-root" | "intermediate" |
  "leaf" | "leaf-rotated" | "leaf-expired" |
  "attacker" | "attacker-expired" | "self-signed" | "cn-only";

/** Read fixture certificate DER. */
export function loadDer(name: FixtureName): Uint8Array {
  return new Uint8Array(fs.readFileSync(new URL(`certs/${name}.cer`, import.meta.url)));
}

/** Read and parse fixture certificate. */
export function loadCert(name: FixtureName): Certificate {
  return Certificate.fromDer(loadDer(name));
}

/** A time when non-expired fixtures are valid. */
export const VALID_TIME = Date.UTC(2030, 0, 1);

/**
 * Re-encode the SubjectPublicKeyInfo length of a certificate in long form.
 * The result is a BER encoding of the same key; the signature no longer verifies.
 */
export function withLongFormSpkiLength(der: Uint8Array): Uint8Array {
  const spki = extractSpki(der);
  const at = Buffer.from(der).indexOf(spki);
  if (spki[1] >= 0x80) {
    throw new Error("SPKI length is not in short form");
  }
  const output = Buffer.concat([der.subarray(0, at), Uint8Array.of(0x30, 0x81), der.subarray(at + 1)]);
  // Certificate and TBSCertificate lengths are both two-octet long form.
  for (const offset of [0, 4]) {
    if (output[offset + 1] !== 0x82) {
      throw new Error(`unexpected length form at ${offset}`);
    }
    output.writeUInt16BE(output.readUInt16BE(offset + 2) + 1, offset + 2);
  }
  return new Uint8Array(output);
}
