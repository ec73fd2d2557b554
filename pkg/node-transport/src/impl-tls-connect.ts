import tls from "node:tls";

import { pEvent } from "p-event";

export async function connectAndWaitSecure(
    opts: tls.ConnectionOptions & { connectTimeout?: number },
): Promise<tls.TLSSocket> {
  const sock = tls.connect(opts);
  try {
    await pEvent(sock, "secureConnect", { timeout: opts.connectTimeout ?? 10000 });
  } catch (err: unknown) {
    sock.destroy();
    throw err;
  }
  return sock;
}
