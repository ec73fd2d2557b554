import { ByteSet } from "@certpin/util";
import { Certificate } from "@certpin/x509";

import { ConfigurationError } from "./errors";
import type { PinningMode } from "./pinning-mode";

/**
 * Pinned certificates, prepared for comparison under a pinning mode.
 *
 * @remarks
 * This type is immutable.
 */
export class PinnedSet {
  /**
   * Parse pinned certificates and compute the comparison set.
   * @param mode - Pinning mode, which determines the comparison set:
   * DER certificates in `certificate` mode, SubjectPublicKeyInfo in `public-key` mode,
   * nothing in `none` mode.
   * @param pins - DER certificates. Duplicates are removed.
   *
   * @throws ConfigurationError
   * Thrown if a pin is not a well-formed certificate, or if `mode` requires pins but there are none.
   */
  public static build(mode: PinningMode, pins: Iterable<Uint8Array>): PinnedSet {
    const seen = new ByteSet();
    const certificates: Certificate[] = [];
    let index = 0;
    for (const der of pins) {
      if (seen.add(der)) {
        try {
          certificates.push(Certificate.fromDer(der));
        } catch (err: unknown) {
          throw new ConfigurationError(`pinned certificate #${index} is malformed`, { cause: err });
        }
      }
      ++index;
    }

    if (mode !== "none" && certificates.length === 0) {
      throw new ConfigurationError(`pinning mode ${mode} requires at least one pinned certificate`);
    }

    let comparison: Iterable<Uint8Array> = [];
    switch (mode) {
      case "certificate": {
        comparison = certificates.map((cert) => cert.der);
        break;
      }
      case "public-key": {
        comparison = certificates.map((cert) => cert.publicKeySpki);
        break;
      }
    }
    return new PinnedSet(mode, certificates, new ByteSet(comparison));
  }

  private constructor(
      public readonly mode: PinningMode,
      /** Distinct pinned certificates, in order of first appearance. */
      public readonly certificates: readonly Certificate[],
      private readonly comparison: ByteSet,
  ) {}

  /** Number of distinct pinned certificates. */
  public get size(): number { return this.certificates.length; }

  /** Number of distinct comparison items: certificates or public keys, depending on mode. */
  public get comparisonSize(): number { return this.comparison.size; }

  /** Determine whether bytes are in the comparison set. */
  public has(bytes: Uint8Array): boolean {
    return this.comparison.has(bytes);
  }

  /**
   * Determine whether a certificate satisfies the pinning mode.
   * @returns In `certificate` mode, whether the certificate is pinned.
   * In `public-key` mode, whether its SubjectPublicKeyInfo is pinned.
   * In `none` mode, always false.
   */
  public matches(cert: Certificate): boolean {
    switch (this.mode) {
      case "certificate": {
        return this.has(cert.der);
      }
      case "public-key": {
        return this.has(cert.publicKeySpki);
      }
      case "none": {
        return false;
      }
    }
  }
}
