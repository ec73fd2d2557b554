import type { ConnectionOptions, TLSSocket } from "node:tls";

import { type Evaluation, type PeerCertificateLike, type SecurityPolicy, ServerTrust } from "@certpin/trust-policy";
import type { Except } from "type-fest";

import { joinHostPort } from "./hostport";
import { connectAndWaitSecure } from "./impl-tls-connect";

/** Error thrown when a security policy rejects the server. */
export class PinningRejectedError extends Error {
  constructor(public readonly endpoint: string, public readonly evaluation: Evaluation) {
    super(`${endpoint} rejected: ${evaluation.reason}`);
    this.name = "PinningRejectedError";
  }

  /** Explanation of the rejection. */
  public get reason(): string { return this.evaluation.reason; }
}

/**
 * Object that exposes the peer certificate chain after TLS handshake.
 * `TLSSocket` satisfies this interface.
 */
export interface PeerCertificateSource {
  getPeerCertificate: (detailed: true) => PeerCertificateLike;
}

/**
 * Evaluate the certificate chain presented on a connected TLS socket.
 * @param hostname - Intended hostname. If omitted, hostname is not validated.
 */
export function evaluateTlsSocket(policy: SecurityPolicy, socket: PeerCertificateSource, hostname?: string): Evaluation {
  const trust = ServerTrust.fromPeerCertificate(socket.getPeerCertificate(true));
  return policy.explain(trust, hostname);
}

/**
 * Connect to a TLS server and decide whether to trust it with a security policy.
 * @param host - Remote host (default is localhost) or connection options.
 * @param port - Remote port. Default is 443.
 * @param opts - Other options.
 * @returns Connected socket and its evaluation, after the server has been accepted.
 *
 * @remarks
 * Node.js certificate verification is disabled, so that the security policy alone decides.
 * The hostname passed to the policy is `servername` if specified, otherwise `host`.
 *
 * @throws PinningRejectedError
 * Thrown if the policy rejects the server. The socket is destroyed.
 */
export async function connectPinned(
    policy: SecurityPolicy,
    host?: string | connectPinned.Options,
    port = 443,
    opts: connectPinned.Options = {},
): Promise<connectPinned.Result> {
  const combined: connectPinned.Options = {
    port,
    ...(typeof host === "string" ? { host } : host),
    ...opts,
  };
  const sock = await connectAndWaitSecure({ ...combined, rejectUnauthorized: false });

  const hostname = combined.servername ?? combined.host ?? "localhost";
  const trust = ServerTrust.fromPeerCertificate(sock.getPeerCertificate(true));
  const evaluation = policy.explain(trust, hostname);
  if (!evaluation.accepted) {
    sock.destroy();
    throw new PinningRejectedError(joinHostPort(hostname, combined.port ?? port), evaluation);
  }
  return { socket: sock, trust, evaluation };
}

export namespace connectPinned {
  /** {@link connectPinned} options. */
  export interface Options extends Except<ConnectionOptions, "rejectUnauthorized" | "checkServerIdentity"> {
    /**
     * Connect timeout (in milliseconds), including TLS handshake.
     * @defaultValue 10000
     */
    connectTimeout?: number;
  }

  /** {@link connectPinned} result. */
  export interface Result {
    socket: TLSSocket;
    /** Certificate chain presented by the server. */
    trust: ServerTrust;
    /** Accepting evaluation. */
    evaluation: Evaluation;
  }
}
