import { generateKeyPairSync, sign } from "node:crypto";

import { encodePem } from "@certpin/x509";
import { ASN1Construction, ASN1TagClass, ASN1UniversalType, DERElement, ObjectIdentifier } from "asn1-ts";

function constructed(tagClass: ASN1TagClass, tagNumber: number, ...children: DERElement[]): DERElement {
  const el = new DERElement(tagClass, ASN1Construction.constructed, tagNumber);
  el.sequence = children;
  return el;
}

function primitive(tagClass: ASN1TagClass, tagNumber: number, value: Uint8Array): DERElement {
  return new DERElement(tagClass, ASN1Construction.primitive, tagNumber, value);
}

const seq = (...children: DERElement[]) => constructed(ASN1TagClass.universal, ASN1UniversalType.sequence, ...children);

function oid(...nodes: number[]): DERElement {
  const el = new DERElement(ASN1TagClass.universal, ASN1Construction.primitive, ASN1UniversalType.objectIdentifier);
  el.objectIdentifier = new ObjectIdentifier(nodes);
  return el;
}

function integer(n: number): DERElement {
  const el = new DERElement(ASN1TagClass.universal, ASN1Construction.primitive, ASN1UniversalType.integer);
  el.integer = n;
  return el;
}

function validity(notBefore: Date, notAfter: Date): DERElement {
  const nb = new DERElement(ASN1TagClass.universal, ASN1Construction.primitive, ASN1UniversalType.utcTime);
  nb.utcTime = notBefore;
  const na = new DERElement(ASN1TagClass.universal, ASN1Construction.primitive, ASN1UniversalType.generalizedTime);
  na.generalizedTime = notAfter;
  return seq(nb, na);
}

function commonName(cn: string): DERElement {
  const value = new DERElement(ASN1TagClass.universal, ASN1Construction.primitive, ASN1UniversalType.utf8String);
  value.utf8String = cn;
  return seq(constructed(ASN1TagClass.universal, ASN1UniversalType.set, seq(oid(2, 5, 4, 3), value)));
}

function subjectAltName(dns: string, ip: readonly string[]): DERElement {
  const names = seq(
    primitive(ASN1TagClass.context, 2, Buffer.from(dns)),
    ...ip.map((addr) => primitive(ASN1TagClass.context, 7, Uint8Array.from(addr.split("."), Number))),
  );
  const extnValue = new DERElement(ASN1TagClass.universal, ASN1Construction.primitive, ASN1UniversalType.octetString);
  extnValue.octetString = names.toBytes();
  return seq(oid(2, 5, 29, 17), extnValue);
}

// ecdsa-with-SHA256
const signatureAlgorithm = () => seq(oid(1, 2, 840, 10045, 4, 3, 2));

/** Self-signed certificate and its private key, created at run time. */
export interface MintedCertificate {
  der: Uint8Array;
  cert: string;
  key: string;
}

/**
 * Create a self-signed ECDSA P-256 certificate.
 * @param cn - Subject CommonName, also the default DNS name.
 * @param ip - IPv4 addresses in SubjectAltName.
 */
export function mintSelfSigned(cn: string, ip: readonly string[] = []): MintedCertificate {
  const { publicKey, privateKey } = generateKeyPairSync("ec", { namedCurve: "prime256v1" });
  const spki = new DERElement();
  spki.fromBytes(publicKey.export({ type: "spki", format: "der" }));

  const tbs = seq(
    constructed(ASN1TagClass.context, 0, integer(2)),
    integer(1),
    signatureAlgorithm(),
    commonName(cn),
    validity(new Date(Date.UTC(2024, 0, 1)), new Date(Date.UTC(2100, 0, 1))),
    commonName(cn),
    spki,
    constructed(ASN1TagClass.context, 3, seq(subjectAltName(cn, ip))),
  );
  const tbsDer = tbs.toBytes();
  const signature = primitive(ASN1TagClass.universal, ASN1UniversalType.bitString,
    Uint8Array.of(0, ...sign("sha256", tbsDer, privateKey)));

  const der = seq(tbs, signatureAlgorithm(), signature).toBytes();
  return {
    der,
    cert: encodePem(der),
    key: String(privateKey.export({ type: "pkcs8", format: "pem" })),
  };
}
