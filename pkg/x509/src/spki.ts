import { ASN1Construction, ASN1TagClass, ASN1UniversalType, DERElement } from "asn1-ts";

interface Located {
  el: DERElement;
  start: number;
  valueStart: number;
  end: number;
}

function readElement(der: Uint8Array, start: number, limit: number): Located {
  const el = new DERElement();
  const end = start + el.fromBytes(der.subarray(start, limit));
  return { el, start, valueStart: end - el.value.length, end };
}

function isSequence({ el }: Located): boolean {
  return el.tagClass === ASN1TagClass.universal &&
    el.construction === ASN1Construction.constructed &&
    el.tagNumber === ASN1UniversalType.sequence;
}

function isExplicitVersion({ el }: Located): boolean {
  return el.tagClass === ASN1TagClass.context && el.tagNumber === 0;
}

// TBSCertificate fields preceding subjectPublicKeyInfo, excluding the optional version.
const SPKI_INDEX = 5;

/**
 * Extract SubjectPublicKeyInfo from a DER-encoded X.509 certificate.
 * @param der - Certificate in DER encoding.
 * @returns SubjectPublicKeyInfo bytes, exactly as they appear in `der`.
 *
 * @throws Error
 * Thrown if `der` is not a single DER Certificate or its TBSCertificate is malformed.
 */
export function extractSpki(der: Uint8Array): Uint8Array {
  const cert = readElement(der, 0, der.length);
  if (!isSequence(cert)) {
    throw new Error("Certificate is not a SEQUENCE");
  }
  if (cert.end !== der.length) {
    throw new Error(`Certificate has ${der.length - cert.end} trailing octets`);
  }

  const tbs = readElement(der, cert.valueStart, cert.end);
  if (!isSequence(tbs)) {
    throw new Error("TBSCertificate is not a SEQUENCE");
  }

  let offset = tbs.valueStart;
  let index = -1;
  while (offset < tbs.end) {
    const field = readElement(der, offset, tbs.end);
    offset = field.end;
    if (index < 0 && isExplicitVersion(field)) {
      continue;
    }
    if (++index < SPKI_INDEX) {
      continue;
    }

    if (!isSequence(field)) {
      throw new Error("SubjectPublicKeyInfo is not a SEQUENCE");
    }
    const algorithm = readElement(der, field.valueStart, field.end);
    if (!isSequence(algorithm)) {
      throw new Error("SubjectPublicKeyInfo.algorithm is not a SEQUENCE");
    }
    return der.slice(field.start, field.end);
  }
  throw new Error("TBSCertificate has no SubjectPublicKeyInfo");
}
