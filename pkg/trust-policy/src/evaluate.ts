import { Certificate } from "@certpin/x509";

import type { ChainValidator } from "./chain-validator";
import { policyLogger as log } from "./log";
import type { PinnedSet } from "./pinned-set";
import type { ServerTrust } from "./server-trust";

/** Configuration consulted by {@link evaluateServerTrust}. */
export interface EvaluationContext {
  readonly pinned: PinnedSet;
  readonly allowInvalidCertificates: boolean;
  readonly validatesDomainName: boolean;
  readonly validator: ChainValidator;
}

/** Outcome of server trust evaluation. */
export interface Evaluation {
  /** Whether the server should be trusted. */
  accepted: boolean;

  /** Human-readable explanation. */
  reason: string;

  /** Chain validator verdict, if the validator was invoked. */
  systemVerdict?: boolean;

  /** Certificate that satisfied pinning, if any. */
  matched?: Certificate;
}

function parsePresented(trust: ServerTrust): Certificate[] | undefined {
  try {
    return trust.chain.map((der) => Certificate.fromDer(der));
  } catch {
    return undefined;
  }
}

/**
 * Decide whether a server chain should be trusted.
 * @param ctx - Pinning mode, pins, and flags.
 * @param trust - Chain presented by the server.
 * @param hostname - Intended hostname. If omitted, hostname is not validated.
 * @param now - Validation time, passed to the chain validator.
 *
 * @remarks
 * This function does not throw. Every failure, including malformed server input and chain
 * validator errors, results in rejection unless the flags tolerate it.
 */
export function evaluateServerTrust(
    ctx: EvaluationContext,
    trust: ServerTrust,
    hostname?: string,
    now?: number,
): Evaluation {
  const result = decide(ctx, trust, hostname, now);
  if (!result.accepted) {
    log.debug(`reject ${hostname ?? "(no hostname)"}: ${result.reason}`);
  }
  return result;
}

function decide(
    { pinned, allowInvalidCertificates, validatesDomainName, validator }: EvaluationContext,
    trust: ServerTrust,
    hostname: string | undefined,
    now: number | undefined,
): Evaluation {
  if (trust.length === 0) {
    return { accepted: false, reason: "server presented no certificate" };
  }

  let result: ChainValidator.Result;
  try {
    result = validator.validate(trust, {
      hostname: validatesDomainName && hostname ? hostname : undefined,
      extraAnchors: pinned.mode === "certificate" ? pinned.certificates : undefined,
      now,
    });
  } catch (err: unknown) {
    result = { systemVerdict: false, chain: [], reason: `chain validator error: ${err}` };
  }
  const { systemVerdict, chain } = result;
  const untrusted = `untrusted chain: ${result.reason ?? "validation failed"}`;

  if (!systemVerdict && !allowInvalidCertificates) {
    return { accepted: false, reason: untrusted, systemVerdict };
  }

  let candidates = chain;
  switch (pinned.mode) {
    case "none": {
      return {
        accepted: true,
        reason: systemVerdict ? "trusted chain" : `allowing ${untrusted}`,
        systemVerdict,
      };
    }
    case "certificate": {
      break;
    }
    case "public-key": {
      if (candidates.length === 0) {
        const presented = parsePresented(trust);
        if (!presented) {
          return { accepted: false, reason: "presented chain contains malformed certificate", systemVerdict };
        }
        candidates = presented;
      }
      break;
    }
  }

  const matched = candidates.find((cert) => pinned.matches(cert));
  if (!matched) {
    return { accepted: false, reason: `no ${pinned.mode} pin matches the chain`, systemVerdict };
  }
  return { accepted: true, reason: `${pinned.mode} pin matches ${matched}`, systemVerdict, matched };
}
