import { openSecurityPolicy } from "@certpin/cli-common";
import { connectPinned, joinHostPort, PinningRejectedError, splitHostPort } from "@certpin/node-transport";
import type { CommandModule } from "yargs";

import { describeCert, print } from "./util";

interface Args {
  host: string;
  port: number;
  servername?: string;
  timeout: number;
}

export const ProbeCommand: CommandModule<{}, Args> = {
  command: "probe <host>",
  describe: "connect to a TLS server and evaluate it with the policy from environment variables",

  builder(argv) {
    return argv
      .positional("host", {
        demandOption: true,
        desc: "server hostname, optionally followed by :port",
        type: "string",
      })
      .option("port", {
        default: 443,
        desc: "server port, if not specified in host",
        type: "number",
      })
      .option("servername", {
        desc: "SNI server name and intended hostname (default is host)",
        type: "string",
      })
      .option("timeout", {
        default: 10000,
        desc: "connect timeout (milliseconds)",
        type: "number",
      });
  },

  async handler({ host: hostport, port: defaultPort, servername, timeout }) {
    const { host, port = defaultPort } = splitHostPort(hostport);
    const policy = await openSecurityPolicy();
    try {
      const { socket, trust, evaluation } = await connectPinned(policy, { host, port, servername, connectTimeout: timeout });
      socket.destroy();
      print(`ACCEPT ${joinHostPort(host, port)} ${evaluation.reason}`);
      for (const der of trust.chain) {
        for (const line of describeCert(der)) {
          print(`  ${line}`);
        }
      }
    } catch (err: unknown) {
      if (err instanceof PinningRejectedError) {
        print(`REJECT ${err.message}`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }
  },
};
