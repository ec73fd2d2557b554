import log from "loglevel";

import { type Env, getEnv } from "./env";

/** Set the level of the root logger and every named logger. */
export function applyLogLevel(level: Env["logLevel"] = getEnv().logLevel): void {
  log.setLevel(level, false);
  for (const logger of Object.values(log.getLoggers())) {
    logger.setLevel(level, false);
  }
}
