import fs from "node:fs/promises";

import { certificatesInBundle, NodeChainValidator, SecurityPolicy } from "@certpin/trust-policy";

import { type Env, getEnv } from "./env";

/**
 * Build a security policy from settings.
 *
 * @remarks
 * If a bundle directory is configured, its certificates become the default pinned certificates,
 * see {@link SecurityPolicy.setDefaultPinnedCertificates}.
 *
 * @throws Error
 * Thrown if the roots file cannot be read, or the policy is not valid.
 */
export async function openSecurityPolicy(env: Env = getEnv()): Promise<SecurityPolicy> {
  if (env.bundle !== undefined) {
    SecurityPolicy.setDefaultPinnedCertificates(await certificatesInBundle(env.bundle));
  }

  const validator = env.roots === undefined ? NodeChainValidator.getDefault() :
    new NodeChainValidator({ roots: [await fs.readFile(env.roots, "utf8")] });

  return SecurityPolicy.withPinningMode(env.mode)
    .withAllowInvalidCertificates(env.allowInvalid)
    .withValidatesDomainName(env.validateDomain)
    .withValidator(validator);
}
