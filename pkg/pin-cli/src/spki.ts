import { Certificate } from "@certpin/x509";
import type { CommandModule } from "yargs";

import { print, readCertificateFiles } from "./util";

interface Args {
  file: string[];
}

export const SpkiCommand: CommandModule<{}, Args> = {
  command: "spki <file..>",
  describe: "show SubjectPublicKeyInfo digest of certificates",
  aliases: ["show"],

  builder(argv) {
    return argv
      .positional("file", {
        array: true,
        demandOption: true,
        desc: "DER or PEM certificate files",
        type: "string",
      });
  },

  async handler({ file }) {
    for (const der of await readCertificateFiles(file)) {
      const cert = Certificate.fromDer(der);
      print(`sha256/${cert.spkiSha256()} ${cert}`);
    }
  },
};
