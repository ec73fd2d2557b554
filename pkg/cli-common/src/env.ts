import "dotenv/config";

import { PinningMode } from "@certpin/trust-policy";
import { from } from "env-var";

const logLevels = ["trace", "debug", "info", "warn", "error", "silent"] as const;

/** Settings read from environment variables. */
export interface Env {
  /** Pinning mode, from CERTPIN_MODE. */
  mode: PinningMode;
  /** Directory of pinned certificates, from CERTPIN_BUNDLE. */
  bundle?: string;
  /** From CERTPIN_ALLOW_INVALID. */
  allowInvalid: boolean;
  /** From CERTPIN_VALIDATE_DOMAIN. */
  validateDomain: boolean;
  /** PEM file that replaces the system trust store, from CERTPIN_ROOTS. */
  roots?: string;
  /** From CERTPIN_LOGLEVEL. */
  logLevel: typeof logLevels[number];
}

/**
 * Read settings from environment variables.
 * @param container - Environment variables, after applying `.env` file.
 *
 * @throws Error
 * Thrown if a variable has an invalid value.
 */
export function parseEnv(container: NodeJS.ProcessEnv = process.env): Env {
  const env = from(container, {
    asPinningMode(value) {
      return PinningMode.parse(value);
    },
  });

  return {
    mode: env.get("CERTPIN_MODE").asPinningMode() ?? PinningMode.Default,
    bundle: env.get("CERTPIN_BUNDLE").asString(),
    allowInvalid: env.get("CERTPIN_ALLOW_INVALID").asBool() ?? false,
    validateDomain: env.get("CERTPIN_VALIDATE_DOMAIN").asBool() ?? true,
    roots: env.get("CERTPIN_ROOTS").asString(),
    logLevel: env.get("CERTPIN_LOGLEVEL").asEnum(logLevels) ?? "warn",
  };
}

let theEnv: Env | undefined;

/** Access settings from `process.env`, read upon first use. */
export function getEnv(): Env {
  theEnv ??= parseEnv();
  return theEnv;
}
