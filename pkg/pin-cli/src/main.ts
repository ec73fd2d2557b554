#!/usr/bin/env -S node --import tsx
import { applyLogLevel } from "@certpin/cli-common";
import { hideBin } from "yargs/helpers";

import { makeParser } from "./parser";

applyLogLevel();
await makeParser(hideBin(process.argv)).parseAsync();
