import fs from "node:fs/promises";

import { fromUtf8 } from "@certpin/util";
import { Certificate, decodePem, isPem } from "@certpin/x509";

/**
 * Read certificates from files.
 * @param files - DER or PEM files. A PEM file may contain several certificates.
 * @returns DER certificates, in order of appearance.
 */
export async function readCertificateFiles(files: readonly string[]): Promise<Uint8Array[]> {
  const ders: Uint8Array[] = [];
  for (const file of files) {
    const content = new Uint8Array(await fs.readFile(file));
    ders.push(...(isPem(content) ? decodePem(fromUtf8(content)) : [content]));
  }
  return ders;
}

/** Describe a certificate: subject line, then indented details. */
export function describeCert(der: Uint8Array): string[] {
  let cert: Certificate;
  try {
    cert = Certificate.fromDer(der);
  } catch {
    return ["(malformed certificate)"];
  }
  return [
    `${cert}`,
    `  spki sha256/${cert.spkiSha256()}`,
    `  serial ${cert.serialNumber}`,
    `  fingerprint ${cert.fingerprint256}`,
  ];
}

export function print(line: string): void {
  process.stdout.write(`${line}\n`);
}
