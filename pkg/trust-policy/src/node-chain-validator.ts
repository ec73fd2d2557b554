import { rootCertificates } from "node:tls";

import { constrain } from "@certpin/util";
import { Certificate } from "@certpin/x509";

import type { ChainValidator } from "./chain-validator";
import { validatorLogger as log } from "./log";
import type { ServerTrust } from "./server-trust";

function parseRoots(input: Iterable<Uint8Array | string>): Certificate[] {
  const roots: Certificate[] = [];
  for (const item of input) {
    try {
      if (typeof item === "string") {
        roots.push(...Certificate.fromPem(item));
      } else {
        roots.push(Certificate.fromDer(item));
      }
    } catch (err: unknown) {
      log.debug(`NodeChainValidator skipping trust store entry: ${err}`);
    }
  }
  return roots;
}

let defaultValidator: NodeChainValidator | undefined;

/**
 * Chain validator built on Node.js X.509 support.
 *
 * @remarks
 * A path is built from the leaf toward a trust anchor, using the other presented certificates
 * as intermediates. Every certificate on the path must be within its validity period, and every
 * issuer on the path must be a CA. Revocation is not checked.
 */
export class NodeChainValidator implements ChainValidator {
  /** Access the shared validator that trusts the Node.js bundled root certificates. */
  public static getDefault(): NodeChainValidator {
    defaultValidator ??= new NodeChainValidator();
    return defaultValidator;
  }

  constructor(opts: NodeChainValidator.Options = {}) {
    const {
      roots,
      maxDepth = 10,
      maxChainLength = 32,
    } = opts;
    this.rootsInput = roots;
    this.maxDepth = constrain(maxDepth, "maxDepth", 1);
    this.maxChainLength = constrain(maxChainLength, "maxChainLength", 1);
  }

  private readonly rootsInput?: Iterable<Uint8Array | string>;
  private roots_?: readonly Certificate[];
  private readonly maxDepth: number;
  private readonly maxChainLength: number;

  /** Trust store, parsed upon first use. */
  public get roots(): readonly Certificate[] {
    this.roots_ ??= parseRoots(this.rootsInput ?? rootCertificates);
    return this.roots_;
  }

  public validate(trust: ServerTrust, {
    hostname,
    extraAnchors = [],
    now = Date.now(),
  }: ChainValidator.Options = {}): ChainValidator.Result {
    if (trust.length === 0) {
      return { systemVerdict: false, chain: [], reason: "empty chain" };
    }
    if (trust.length > this.maxChainLength) {
      return { systemVerdict: false, chain: [], reason: `chain length ${trust.length} exceeds limit` };
    }

    const [leafDer, ...intermediateDers] = trust.chain;
    let leaf: Certificate;
    try {
      leaf = Certificate.fromDer(leafDer ?? new Uint8Array());
    } catch (err: unknown) {
      return { systemVerdict: false, chain: [], reason: `leaf: ${err}` };
    }
    const candidates: Certificate[] = [];
    for (const der of intermediateDers) {
      try {
        candidates.push(Certificate.fromDer(der));
      } catch (err: unknown) {
        log.debug(`NodeChainValidator ignoring presented certificate: ${err}`);
      }
    }

    const anchors = [...extraAnchors, ...this.roots];
    const chain = [leaf];
    const anchored = this.buildPath(chain, candidates, anchors);
    const fail = (reason: string): ChainValidator.Result => ({ systemVerdict: false, chain, reason });
    if (!anchored) {
      return fail(`no path from ${leaf} to a trust anchor`);
    }

    for (const [i, cert] of chain.entries()) {
      if (!cert.isWithinValidity(now)) {
        return fail(`${cert} is outside its validity period`);
      }
      if (i > 0 && !cert.isCA) {
        return fail(`${cert} is not a CA`);
      }
    }

    if (hostname !== undefined && !leaf.matchesHostname(hostname)) {
      return fail(`${leaf} does not match hostname ${hostname}`);
    }
    return { systemVerdict: true, chain };
  }

  /**
   * Extend `chain` toward a trust anchor.
   * @returns Whether an anchor was reached.
   */
  private buildPath(chain: Certificate[], candidates: Certificate[], anchors: readonly Certificate[]): boolean {
    let current = chain.at(-1);
    while (current) {
      const cert = current;
      if (anchors.some((anchor) => anchor.equals(cert))) {
        return true;
      }

      const anchor = anchors.find((a) => cert.isIssuedBy(a));
      if (anchor) {
        chain.push(anchor);
        return true;
      }

      if (chain.length >= this.maxDepth) {
        return false;
      }
      const index = candidates.findIndex((c) => cert.isIssuedBy(c));
      if (index < 0) {
        return false;
      }
      [current] = candidates.splice(index, 1);
      if (current) {
        chain.push(current);
      }
    }
    return false;
  }
}

export namespace NodeChainValidator {
  export interface Options {
    /**
     * Trust store: DER certificates, or PEM text with one or more certificates.
     * @defaultValue `tls.rootCertificates`
     */
    roots?: Iterable<Uint8Array | string>;

    /**
     * Maximum number of certificates on a path before the trust anchor.
     * @defaultValue 10
     */
    maxDepth?: number;

    /**
     * Maximum number of certificates the server may present.
     * Longer chains are not validated.
     * @defaultValue 32
     */
    maxChainLength?: number;
  }
}
