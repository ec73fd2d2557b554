import { Certificate, decodePem } from "@certpin/x509";

/**
 * Subset of Node.js `tls.DetailedPeerCertificate` used to reconstruct the peer chain.
 * The object returned by `TLSSocket.getPeerCertificate(true)` satisfies this interface.
 */
export interface PeerCertificateLike {
  raw?: Uint8Array;
  issuerCertificate?: PeerCertificateLike;
}

/**
 * Certificate chain presented by a server during TLS handshake, leaf first.
 *
 * @remarks
 * This type is immutable. Entries are not parsed until a chain validator inspects them,
 * so that malformed server input is rejected during evaluation rather than thrown here.
 */
export class ServerTrust {
  /** Construct from DER blobs or parsed certificates, leaf first. */
  public static from(chain: Iterable<Uint8Array | Certificate>): ServerTrust {
    return new ServerTrust(Array.from(chain,
      (item) => Uint8Array.from(item instanceof Certificate ? item.der : item)));
  }

  /** Construct from PEM text containing the chain, leaf first. */
  public static fromPem(text: string): ServerTrust {
    return new ServerTrust(decodePem(text));
  }

  /**
   * Construct from a Node.js peer certificate, following `.issuerCertificate` links.
   * @param peer - Result of `TLSSocket.getPeerCertificate(true)`.
   * @param maxLength - Stop after this many certificates.
   *
   * @remarks
   * Node.js ends the chain with a certificate whose `.issuerCertificate` refers to itself.
   * An empty object, returned when the peer sent no certificate, yields an empty chain.
   */
  public static fromPeerCertificate(peer: PeerCertificateLike, maxLength = 64): ServerTrust {
    const chain: Uint8Array[] = [];
    const visited = new Set<PeerCertificateLike>();
    let cert: PeerCertificateLike | undefined = peer;
    while (cert && !visited.has(cert) && chain.length < maxLength) {
      const { raw, issuerCertificate }: PeerCertificateLike = cert;
      if (!raw) {
        break;
      }
      visited.add(cert);
      chain.push(Uint8Array.from(raw));
      cert = issuerCertificate;
    }
    return new ServerTrust(chain);
  }

  private constructor(private readonly chain_: readonly Uint8Array[]) {}

  /** DER encoding of presented certificates, leaf first. */
  public get chain(): readonly Uint8Array[] { return this.chain_; }

  /** Number of presented certificates. */
  public get length(): number { return this.chain_.length; }

  /** DER encoding of the leaf certificate. */
  public get leaf(): Uint8Array | undefined { return this.chain_[0]; }
}
