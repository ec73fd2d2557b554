import "@certpin/util/test-fixture/expect";

import { ConfigurationError, NodeChainValidator, ServerTrust } from "@certpin/trust-policy";
import { makeTmpDir, type TmpDir } from "@certpin/util/test-fixture/tmp";
import { encodePem } from "@certpin/x509";
import { type FixtureName, loadDer, VALID_TIME } from "@certpin/x509/test-fixture/certs";
import log from "loglevel";
import { afterEach, beforeEach, expect, test } from "vitest";

import { applyLogLevel, type Env, openSecurityPolicy, parseEnv } from "..";

function chainOf(...names: FixtureName[]): ServerTrust {
  return ServerTrust.from(names.map((name) => loadDer(name)));
}

let tmpDir: TmpDir;
let env: Env;
beforeEach(() => {
  tmpDir = makeTmpDir();
  tmpDir.createFile("pins/leaf.cer", loadDer("leaf"));
  tmpDir.createFile("roots.pem", encodePem(loadDer("root")));
  env = parseEnv({
    CERTPIN_BUNDLE: tmpDir.join("pins"),
    CERTPIN_ROOTS: tmpDir.join("roots.pem"),
  });
});
afterEach(() => tmpDir.close());

test("default", async () => {
  const policy = await openSecurityPolicy(parseEnv({}));
  expect(policy.pinningMode).toBe("none");
  expect(policy.validator).toBe(NodeChainValidator.getDefault());
});

test("public-key with bundle", async () => {
  const policy = await openSecurityPolicy({ ...env, mode: "public-key" });
  expect(policy.pinningMode).toBe("public-key");
  expect(policy.pinnedCertificates).toHaveLength(1);
  expect(policy.pinnedCertificates[0]).toEqualUint8Array(loadDer("leaf"));
  expect(policy.allowInvalidCertificates).toBeFalsy();
  expect(policy.validatesDomainName).toBeTruthy();

  expect(policy.evaluateServerTrust(chainOf("leaf-rotated", "intermediate"), "example.com", VALID_TIME)).toBeTruthy();
  expect(policy.evaluateServerTrust(chainOf("attacker", "intermediate"), "example.com", VALID_TIME)).toBeFalsy();
  expect(policy.evaluateServerTrust(chainOf("leaf", "intermediate"), "evil.com", VALID_TIME)).toBeFalsy();
});

test("flags", async () => {
  const policy = await openSecurityPolicy({ ...env, mode: "certificate", allowInvalid: true, validateDomain: false });
  expect(policy.allowInvalidCertificates).toBeTruthy();
  expect(policy.validatesDomainName).toBeFalsy();
  expect(policy.evaluateServerTrust(chainOf("leaf"), "evil.com", VALID_TIME)).toBeTruthy();
  expect(policy.evaluateServerTrust(chainOf("leaf-rotated", "intermediate"), "example.com", VALID_TIME)).toBeFalsy();
});

test("empty bundle", async () => {
  const empty = tmpDir.join("empty");
  tmpDir.createFile("empty/README", "no certificates here");
  await expect(openSecurityPolicy({ ...env, bundle: empty, mode: "certificate" })).rejects.toThrow(ConfigurationError);
});

test("missing roots", async () => {
  await expect(openSecurityPolicy({ ...env, roots: tmpDir.join("missing.pem") })).rejects.toThrow(/ENOENT/);
});

test("applyLogLevel", () => {
  const logger = log.getLogger("certpin.policy");
  applyLogLevel("debug");
  expect(log.getLevel()).toBe(log.levels.DEBUG);
  expect(logger.getLevel()).toBe(log.levels.DEBUG);
  applyLogLevel("warn");
  expect(logger.getLevel()).toBe(log.levels.WARN);
});
