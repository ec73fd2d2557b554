import { X509Certificate } from "node:crypto";
import { isIP } from "node:net";

import { sha256, timingSafeEqual, toBase64 } from "@certpin/util";

import { decodePem } from "./pem";
import { extractSpki } from "./spki";

/** Error thrown when bytes cannot be decoded as an X.509 certificate. */
export class MalformedCertificateError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MalformedCertificateError";
  }
}

/**
 * X.509 certificate.
 *
 * @remarks
 * This type is immutable. It does not verify signatures or validity period on its own;
 * those are checked by a chain validator.
 */
export class Certificate {
  /**
   * Parse a certificate from DER encoding.
   *
   * @throws MalformedCertificateError
   * Thrown if `der` is not a well-formed X.509 certificate.
   */
  public static fromDer(der: Uint8Array): Certificate {
    const copy = Uint8Array.from(der);
    let spki: Uint8Array;
    let x509: X509Certificate;
    try {
      spki = extractSpki(copy);
      x509 = new X509Certificate(copy);
    } catch (err: unknown) {
      throw new MalformedCertificateError(`malformed certificate: ${err}`, { cause: err });
    }
    return new Certificate(copy, x509, spki);
  }

  /**
   * Parse every CERTIFICATE block in PEM text.
   *
   * @throws MalformedCertificateError
   * Thrown if any block does not contain a well-formed certificate.
   */
  public static fromPem(text: string): Certificate[] {
    return decodePem(text).map((der) => Certificate.fromDer(der));
  }

  private constructor(
      /** Certificate in DER encoding. */
      public readonly der: Uint8Array,
      /** Node.js certificate object, used by chain validation. */
      public readonly x509: X509Certificate,
      /** SubjectPublicKeyInfo, as encoded within {@link Certificate.der}. */
      public readonly publicKeySpki: Uint8Array,
  ) {}

  public get subject(): string { return this.x509.subject; }
  public get issuer(): string { return this.x509.issuer; }
  public get serialNumber(): string { return this.x509.serialNumber; }
  public get subjectAltName(): string | undefined { return this.x509.subjectAltName; }
  public get validFrom(): Date { return new Date(this.x509.validFrom); }
  public get validTo(): Date { return new Date(this.x509.validTo); }

  /** Whether BasicConstraints marks this as a CA certificate. */
  public get isCA(): boolean { return this.x509.ca; }

  /** Whether the certificate is issued by itself and carries a valid self-signature. */
  public get isSelfSigned(): boolean {
    return this.isIssuedBy(this);
  }

  /** SHA-256 fingerprint, colon-separated upper-case hex. */
  public get fingerprint256(): string { return this.x509.fingerprint256; }

  /** Compare DER encoding. */
  public equals(other: Certificate): boolean {
    return timingSafeEqual(this.der, other.der);
  }

  /** Determine whether `now` falls within the validity period. */
  public isWithinValidity(now: number = Date.now()): boolean {
    return this.validFrom.getTime() <= now && now <= this.validTo.getTime();
  }

  /**
   * Determine whether `issuer` issued this certificate.
   * Issuer name and key identifiers must match, and the signature must verify with issuer's key.
   */
  public isIssuedBy(issuer: Certificate): boolean {
    try {
      return this.x509.checkIssued(issuer.x509) && this.x509.verify(issuer.x509.publicKey);
    } catch {
      return false;
    }
  }

  /**
   * Determine whether the certificate is valid for a hostname.
   * @param hostname - DNS name or IP address literal. A trailing dot is ignored.
   *
   * @remarks
   * DNS names are matched against SubjectAltName dNSName entries, falling back to the subject
   * CommonName only if there are none. IP addresses are matched against iPAddress entries.
   */
  public matchesHostname(hostname: string): boolean {
    const name = hostname.replace(/\.$/, "");
    if (name === "") {
      return false;
    }
    const ip = name.startsWith("[") && name.endsWith("]") ? name.slice(1, -1) : name;
    try {
      if (isIP(ip) !== 0) {
        return this.x509.checkIP(ip) !== undefined;
      }
      return this.x509.checkHost(name) !== undefined;
    } catch {
      // invalid name, such as one containing NUL
      return false;
    }
  }

  /** SHA-256 digest of SubjectPublicKeyInfo in base64, as used by `pin-sha256` notation. */
  public spkiSha256(): string {
    return toBase64(sha256(this.publicKeySpki));
  }

  public toString(): string {
    return this.subject.replaceAll("\n", ", ");
  }
}
