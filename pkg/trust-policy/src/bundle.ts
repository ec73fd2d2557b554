import fs from "node:fs/promises";
import path from "node:path";

import { ByteSet, fromUtf8 } from "@certpin/util";
import { Certificate, decodePem, isPem } from "@certpin/x509";
import readdirp from "readdirp";

import { ConfigurationError } from "./errors";
import { bundleLogger as log } from "./log";

/**
 * Collect certificates from files in a directory, for use as pinned certificates.
 * @param dir - Directory, scanned recursively.
 * @returns DER certificates, deduplicated, ordered by relative filename.
 *
 * @remarks
 * A DER file contributes one certificate. A PEM file contributes every CERTIFICATE block.
 *
 * @throws ConfigurationError
 * Thrown in strict mode if a file does not contain well-formed certificates.
 */
export async function certificatesInBundle(dir: string, {
  extensions = certificatesInBundle.DefaultExtensions,
  strict = false,
}: certificatesInBundle.Options = {}): Promise<Uint8Array[]> {
  const exts = new Set(extensions.map((ext) => ext.toLowerCase()));
  const entries = await readdirp.promise(path.resolve(dir), {
    fileFilter: ({ basename }) => exts.has(path.extname(basename).toLowerCase()),
  });
  entries.sort((a, b) => a.path < b.path ? -1 : a.path > b.path ? 1 : 0);

  const found = new ByteSet();
  for (const { path: relPath, fullPath } of entries) {
    const content = new Uint8Array(await fs.readFile(fullPath));
    let ders: Uint8Array[];
    try {
      ders = decodeFile(content);
    } catch (err: unknown) {
      if (strict) {
        throw new ConfigurationError(`${relPath} is not a certificate`, { cause: err });
      }
      log.warn(`certificatesInBundle skipping ${relPath}: ${err}`);
      continue;
    }
    for (const der of ders) {
      found.add(der);
    }
  }
  log.debug(`certificatesInBundle found ${found.size} certificates in ${dir}`);
  return Array.from(found);
}

function decodeFile(content: Uint8Array): Uint8Array[] {
  const ders = isPem(content) ? decodePem(fromUtf8(content)) : [content];
  if (ders.length === 0) {
    throw new Error("no CERTIFICATE block");
  }
  for (const der of ders) {
    Certificate.fromDer(der);
  }
  return ders;
}

export namespace certificatesInBundle {
  export const DefaultExtensions: readonly string[] = [".cer", ".der", ".crt", ".pem"];

  export interface Options {
    /**
     * Filename extensions to consider, including the leading dot. Case is ignored.
     * @defaultValue `[".cer", ".der", ".crt", ".pem"]`
     */
    extensions?: readonly string[];

    /**
     * If true, a file that does not parse is an error.
     * If false, such files are skipped with a warning.
     * @defaultValue false
     */
    strict?: boolean;
  }
}
