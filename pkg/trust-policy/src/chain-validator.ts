import type { Certificate } from "@certpin/x509";

import type { ServerTrust } from "./server-trust";

/**
 * Chain validation against a trust store.
 *
 * @remarks
 * Implementations must be synchronous and must not throw on malformed server input;
 * such input yields a negative verdict.
 */
export interface ChainValidator {
  /**
   * Validate a server certificate chain.
   * @param trust - Presented chain.
   * @param opts - Hostname, additional anchors, and validation time.
   */
  validate: (trust: ServerTrust, opts?: ChainValidator.Options) => ChainValidator.Result;
}

export namespace ChainValidator {
  export interface Options {
    /**
     * Hostname that the leaf certificate must match.
     * If omitted, hostname matching is disabled.
     */
    hostname?: string;

    /**
     * Additional trust anchors for this validation only.
     * @defaultValue `[]`
     */
    extraAnchors?: readonly Certificate[];

    /**
     * Validation time, in milliseconds since epoch.
     * @defaultValue `Date.now()`
     */
    now?: number;
  }

  export interface Result {
    /**
     * Whether the chain is well-formed, anchored, properly signed, within validity period,
     * and (when requested) matching the hostname.
     */
    systemVerdict: boolean;

    /**
     * Certificates inspected during validation, leaf first, ending at the trust anchor if one
     * was reached. This is populated even when `systemVerdict` is false; it is empty only when
     * the leaf could not be parsed.
     */
    chain: Certificate[];

    /** Explanation of a negative verdict. */
    reason?: string;
  }
}
