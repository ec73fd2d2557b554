import yargs, { type Argv } from "yargs";

import { EvaluateCommand } from "./evaluate";
import { ProbeCommand } from "./probe";
import { SpkiCommand } from "./spki";

export const COMMAND = "certpin";

/** Construct the command line parser. */
export function makeParser(argv: readonly string[]): Argv {
  return yargs(argv)
    .scriptName(COMMAND)
    .command(SpkiCommand)
    .command(new EvaluateCommand())
    .command(ProbeCommand)
    .demandCommand()
    .strict();
}
