import { once } from "node:events";
import type net from "node:net";

import { assert } from "@certpin/util";

/** Wrapper of a listening server on 127.0.0.1. */
export class TestServer {
  /** Start listening on a random port. */
  public static async listen(server: net.Server): Promise<TestServer> {
    const s = new TestServer(server);
    server.listen(0, "127.0.0.1");
    await once(server, "listening");
    return s;
  }

  private readonly sockets = new Set<net.Socket>();

  private constructor(public readonly server: net.Server) {
    server.on("connection", (sock: net.Socket) => {
      this.sockets.add(sock);
      sock.on("error", () => undefined);
      sock.on("close", () => this.sockets.delete(sock));
    });
  }

  public get port(): number {
    const addr = this.server.address();
    assert(addr !== null && typeof addr === "object");
    return addr.port;
  }

  /** Disconnect all clients and stop listening. */
  public readonly close = async (): Promise<void> => {
    for (const sock of this.sockets) {
      sock.destroy();
    }
    this.server.close();
    await once(this.server, "close");
  };
}
