import { getEnv } from "@certpin/cli-common";
import { certificatesInBundle, NodeChainValidator, PinningMode, SecurityPolicy, ServerTrust } from "@certpin/trust-policy";
import { console } from "@certpin/util";
import type { Arguments, Argv, CommandModule } from "yargs";

import { print, readCertificateFiles } from "./util";

interface Args {
  chain: string[];
  mode?: PinningMode;
  pin: string[];
  bundle?: string;
  host?: string;
  "allow-invalid"?: boolean;
  "validate-domain"?: boolean;
  roots?: string;
  at?: Date;
}

function parseTime(input: string): Date {
  const t = new Date(input);
  if (Number.isNaN(t.getTime())) {
    throw new Error(`invalid time ${input}`);
  }
  return t;
}

export class EvaluateCommand implements CommandModule<{}, Args> {
  public readonly command = "evaluate <chain..>";
  public readonly describe = "evaluate a server certificate chain";
  public readonly aliases = ["eval"];

  public builder(argv: Argv): Argv<Args> {
    return argv
      .positional("chain", {
        array: true,
        demandOption: true,
        desc: "certificate files, leaf first",
        type: "string",
      })
      .option("mode", {
        choices: PinningMode.Choices,
        desc: "pinning mode (default from CERTPIN_MODE)",
      })
      .option("pin", {
        array: true,
        default: [],
        desc: "pinned certificate files",
        type: "string",
      })
      .option("bundle", {
        desc: "directory of pinned certificates (default from CERTPIN_BUNDLE)",
        type: "string",
      })
      .option("host", {
        desc: "intended hostname",
        type: "string",
      })
      .option("allow-invalid", {
        desc: "allow certificate chains that fail validation (default from CERTPIN_ALLOW_INVALID)",
        type: "boolean",
      })
      .option("validate-domain", {
        desc: "validate hostname (default from CERTPIN_VALIDATE_DOMAIN)",
        type: "boolean",
      })
      .option("roots", {
        desc: "trust store file, instead of system roots (default from CERTPIN_ROOTS)",
        type: "string",
      })
      .option("at", {
        coerce: parseTime,
        desc: "validation time (default is now)",
        type: "string",
      });
  }

  public async handler(args: Arguments<Args>) {
    const env = getEnv();
    const pins = await readCertificateFiles(args.pin);
    const bundle = args.bundle ?? env.bundle;
    if (bundle !== undefined) {
      pins.push(...await certificatesInBundle(bundle));
    }
    const roots = args.roots ?? env.roots;

    const policy = SecurityPolicy.create({
      pinningMode: args.mode ?? env.mode,
      pinnedCertificates: pins,
      allowInvalidCertificates: args["allow-invalid"] ?? env.allowInvalid,
      validatesDomainName: args["validate-domain"] ?? env.validateDomain,
      validator: roots === undefined ? NodeChainValidator.getDefault() :
        new NodeChainValidator({ roots: await readCertificateFiles([roots]) }),
    });

    if (args.host === undefined && policy.validatesDomainName) {
      console.warn("--host not specified, hostname is not validated");
    }

    const trust = ServerTrust.from(await readCertificateFiles(args.chain));
    const { accepted, reason } = policy.explain(trust, args.host, args.at?.getTime());
    print(`${accepted ? "ACCEPT" : "REJECT"} ${reason}`);
    if (!accepted) {
      process.exitCode = 1;
    }
  }
}
