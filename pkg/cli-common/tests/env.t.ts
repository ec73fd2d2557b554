import { expect, test } from "vitest";

import { parseEnv } from "..";

test("defaults", () => {
  expect(parseEnv({})).toEqual({
    mode: "none",
    bundle: undefined,
    allowInvalid: false,
    validateDomain: true,
    roots: undefined,
    logLevel: "warn",
  });
});

test("values", () => {
  expect(parseEnv({
    CERTPIN_MODE: "PublicKey",
    CERTPIN_BUNDLE: "/etc/certpin/pins",
    CERTPIN_ALLOW_INVALID: "1",
    CERTPIN_VALIDATE_DOMAIN: "false",
    CERTPIN_ROOTS: "/etc/certpin/roots.pem",
    CERTPIN_LOGLEVEL: "debug",
  })).toEqual({
    mode: "public-key",
    bundle: "/etc/certpin/pins",
    allowInvalid: true,
    validateDomain: false,
    roots: "/etc/certpin/roots.pem",
    logLevel: "debug",
  });
});

test("invalid", () => {
  expect(() => parseEnv({ CERTPIN_MODE: "fingerprint" })).toThrow(/CERTPIN_MODE/);
  expect(() => parseEnv({ CERTPIN_ALLOW_INVALID: "maybe" })).toThrow(/CERTPIN_ALLOW_INVALID/);
  expect(() => parseEnv({ CERTPIN_LOGLEVEL: "verbose" })).toThrow(/CERTPIN_LOGLEVEL/);
});
