import "@certpin/util/test-fixture/expect";

import { encodePem } from "@certpin/x509";
import { loadCert, loadDer } from "@certpin/x509/test-fixture/certs";
import { expect, test } from "vitest";

import { type PeerCertificateLike, ServerTrust } from "..";

test("from", () => {
  const leaf = loadDer("leaf");
  const trust = ServerTrust.from([leaf, loadCert("intermediate")]);
  expect(trust.length).toBe(2);
  expect(trust.leaf).toEqualUint8Array(loadDer("leaf"));
  expect(trust.chain[1]).toEqualUint8Array(loadDer("intermediate"));

  leaf.fill(0);
  expect(trust.leaf).toEqualUint8Array(loadDer("leaf"));
});

test("from malformed", () => {
  const trust = ServerTrust.from([Uint8Array.of(0x30, 0x00)]);
  expect(trust.length).toBe(1);
});

test("empty", () => {
  const trust = ServerTrust.from([]);
  expect(trust.length).toBe(0);
  expect(trust.leaf).toBeUndefined();
});

test("fromPem", () => {
  const trust = ServerTrust.fromPem(`${encodePem(loadDer("leaf"))}${encodePem(loadDer("intermediate"))}`);
  expect(trust.length).toBe(2);
  expect(trust.chain[0]).toEqualUint8Array(loadDer("leaf"));
  expect(trust.chain[1]).toEqualUint8Array(loadDer("intermediate"));
});

test("fromPeerCertificate", () => {
  const root: PeerCertificateLike = { raw: Buffer.from(loadDer("root")) };
  root.issuerCertificate = root;
  const peer: PeerCertificateLike = {
    raw: Buffer.from(loadDer("leaf")),
    issuerCertificate: {
      raw: Buffer.from(loadDer("intermediate")),
      issuerCertificate: root,
    },
  };

  const trust = ServerTrust.fromPeerCertificate(peer);
  expect(trust.length).toBe(3);
  expect(trust.chain[0]).toEqualUint8Array(loadDer("leaf"));
  expect(trust.chain[1]).toEqualUint8Array(loadDer("intermediate"));
  expect(trust.chain[2]).toEqualUint8Array(loadDer("root"));

  expect(ServerTrust.fromPeerCertificate(peer, 2).length).toBe(2);
  expect(ServerTrust.fromPeerCertificate({}).length).toBe(0);
});
