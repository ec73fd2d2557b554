import { encodePem } from "@certpin/x509";
import { type FixtureName, loadCert, loadDer, VALID_TIME } from "@certpin/x509/test-fixture/certs";
import { describe, expect, test } from "vitest";

import { NodeChainValidator, ServerTrust } from "..";

function chainOf(...names: FixtureName[]): ServerTrust {
  return ServerTrust.from(names.map((name) => loadDer(name)));
}

const validator = new NodeChainValidator({ roots: [loadDer("root")] });

describe("path", () => {
  test("anchored", () => {
    const { systemVerdict, chain, reason } = validator.validate(chainOf("leaf", "intermediate"), { now: VALID_TIME });
    expect(systemVerdict).toBeTruthy();
    expect(chain.map(String)).toEqual(["CN=example.com", "CN=Test Intermediate CA, O=Test", "CN=Test Root CA, O=Test"]);
    expect(reason).toBeUndefined();
  });

  test("root presented", () => {
    const { systemVerdict, chain } = validator.validate(chainOf("leaf", "intermediate", "root"), { now: VALID_TIME });
    expect(systemVerdict).toBeTruthy();
    expect(chain).toHaveLength(3);
  });

  test("out of order", () => {
    const { systemVerdict, chain } = validator.validate(chainOf("leaf", "root", "intermediate"), { now: VALID_TIME });
    expect(systemVerdict).toBeTruthy();
    expect(chain).toHaveLength(3);
  });

  test("missing intermediate", () => {
    const { systemVerdict, chain, reason } = validator.validate(chainOf("leaf"), { now: VALID_TIME });
    expect(systemVerdict).toBeFalsy();
    expect(chain.map(String)).toEqual(["CN=example.com"]);
    expect(reason).toBe("no path from CN=example.com to a trust anchor");
  });

  test("untrusted root", () => {
    const v = new NodeChainValidator({ roots: [loadDer("other-root")] });
    const { systemVerdict, chain } = v.validate(chainOf("leaf", "intermediate", "root"), { now: VALID_TIME });
    expect(systemVerdict).toBeFalsy();
    expect(chain).toHaveLength(3);
  });

  test("extra anchors", () => {
    const v = new NodeChainValidator({ roots: [loadDer("other-root")] });
    const { systemVerdict, chain } = v.validate(chainOf("leaf"), {
      extraAnchors: [loadCert("intermediate")],
      now: VALID_TIME,
    });
    expect(systemVerdict).toBeTruthy();
    expect(chain.map(String)).toEqual(["CN=example.com", "CN=Test Intermediate CA, O=Test"]);

    expect(v.validate(chainOf("leaf"), { now: VALID_TIME }).systemVerdict).toBeFalsy();
  });

  test("self-signed", () => {
    expect(validator.validate(chainOf("self-signed"), { now: VALID_TIME }).systemVerdict).toBeFalsy();
    const { systemVerdict, chain } = validator.validate(chainOf("self-signed"), {
      extraAnchors: [loadCert("self-signed")],
      now: VALID_TIME,
    });
    expect(systemVerdict).toBeTruthy();
    expect(chain.map(String)).toEqual(["CN=pinned.test"]);
  });
});

describe("validity", () => {
  test("expired leaf", () => {
    const { systemVerdict, chain, reason } = validator.validate(chainOf("leaf-expired", "intermediate"), { now: VALID_TIME });
    expect(systemVerdict).toBeFalsy();
    expect(chain).toHaveLength(3);
    expect(reason).toBe("CN=example.com is outside its validity period");
  });

  test("intermediate not yet valid", () => {
    const { systemVerdict, reason } = validator.validate(chainOf("leaf-expired", "intermediate"), {
      now: Date.UTC(2020, 5, 1),
    });
    expect(systemVerdict).toBeFalsy();
    expect(reason).toBe("CN=Test Intermediate CA, O=Test is outside its validity period");
  });

  test("leaf not yet valid", () => {
    const { systemVerdict } = validator.validate(chainOf("leaf-rotated", "intermediate"), {
      now: Date.UTC(2024, 5, 1),
    });
    expect(systemVerdict).toBeFalsy();
  });
});

describe("hostname", () => {
  test.each<[string, boolean]>([
    ["example.com", true],
    ["www.example.com", true],
    ["example.com.", true],
    ["evil.com", false],
    ["sub.www.example.com", false],
    ["127.0.0.1", false],
  ])("%s", (hostname, ok) => {
    const { systemVerdict, chain } = validator.validate(chainOf("leaf", "intermediate"), { hostname, now: VALID_TIME });
    expect(systemVerdict).toBe(ok);
    expect(chain).toHaveLength(3);
  });

  test.each<[string, boolean]>([
    ["pinned.test", true],
    ["127.0.0.1", true],
    ["127.0.0.2", false],
    ["example.com", false],
  ])("self-signed %s", (hostname, ok) => {
    const { systemVerdict } = validator.validate(chainOf("self-signed"), {
      hostname,
      extraAnchors: [loadCert("self-signed")],
      now: VALID_TIME,
    });
    expect(systemVerdict).toBe(ok);
  });

  test.each<[string, boolean]>([
    ["cn.test", true],
    ["other.test", false],
  ])("CommonName only %s", (hostname, ok) => {
    const { systemVerdict, chain, reason } = validator.validate(chainOf("cn-only", "intermediate"), { hostname, now: VALID_TIME });
    expect(systemVerdict).toBe(ok);
    expect(chain).toHaveLength(3);
    expect(reason).toBe(ok ? undefined : `CN=cn.test does not match hostname ${hostname}`);
  });

  test("invalid name", () => {
    const { systemVerdict, reason } = validator.validate(chainOf("leaf", "intermediate"), {
      hostname: "example.com\0.evil.com",
      now: VALID_TIME,
    });
    expect(systemVerdict).toBeFalsy();
    expect(reason).toBe("CN=example.com does not match hostname example.com\0.evil.com");
  });
});

describe("malformed", () => {
  test("empty chain", () => {
    expect(validator.validate(ServerTrust.from([]))).toEqual({ systemVerdict: false, chain: [], reason: "empty chain" });
  });

  test("leaf", () => {
    const { systemVerdict, chain } = validator.validate(ServerTrust.from([Uint8Array.of(0x30, 0x00), loadDer("intermediate")]));
    expect(systemVerdict).toBeFalsy();
    expect(chain).toHaveLength(0);
  });

  test("intermediate ignored", () => {
    const trust = ServerTrust.from([loadDer("leaf"), Uint8Array.of(0x04, 0x00), loadDer("intermediate")]);
    expect(validator.validate(trust, { now: VALID_TIME }).systemVerdict).toBeTruthy();
  });
});

describe("limits", () => {
  test("maxChainLength", () => {
    const v = new NodeChainValidator({ roots: [loadDer("root")], maxChainLength: 2 });
    const { systemVerdict, chain, reason } = v.validate(chainOf("leaf", "intermediate", "root"), { now: VALID_TIME });
    expect(systemVerdict).toBeFalsy();
    expect(chain).toHaveLength(0);
    expect(reason).toBe("chain length 3 exceeds limit");
  });

  test("maxDepth", () => {
    const v1 = new NodeChainValidator({ roots: [loadDer("root")], maxDepth: 1 });
    expect(v1.validate(chainOf("leaf", "intermediate"), { now: VALID_TIME }).systemVerdict).toBeFalsy();
    const v2 = new NodeChainValidator({ roots: [loadDer("root")], maxDepth: 2 });
    expect(v2.validate(chainOf("leaf", "intermediate"), { now: VALID_TIME }).systemVerdict).toBeTruthy();
  });

  test("invalid options", () => {
    expect(() => new NodeChainValidator({ maxDepth: 0 })).toThrow(RangeError);
    expect(() => new NodeChainValidator({ maxChainLength: -1 })).toThrow(RangeError);
  });
});

test("roots", () => {
  const v = new NodeChainValidator({
    roots: [Uint8Array.of(0x01), encodePem(loadDer("root")) + encodePem(loadDer("other-root"))],
  });
  expect(v.roots.map(String)).toEqual(["CN=Test Root CA, O=Test", "CN=Other Root CA, O=Test"]);
  expect(v.roots).toBe(v.roots);
});

test("getDefault", () => {
  expect(NodeChainValidator.getDefault()).toBe(NodeChainValidator.getDefault());
});
