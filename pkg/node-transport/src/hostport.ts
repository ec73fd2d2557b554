import { isIPv6 } from "node:net";

/** Join host and port, enclosing IPv6 addresses in brackets. */
export function joinHostPort(host: string, port: number): string {
  return isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * Split host and optional port.
 * @param hostport - Hostname, IPv4 address, or bracketed IPv6 address, optionally followed by `:port`.
 */
export function splitHostPort(hostport: string): { host: string; port?: number } {
  const m = /^(?:\[([^\]]+)\]|([^:[\]]+))(?::(\d+))?$/.exec(hostport);
  if (!m) {
    return { host: hostport, port: undefined };
  }
  const [, ipv6, other, port] = m;
  return {
    host: ipv6 ?? other ?? hostport,
    port: port === undefined ? undefined : Number.parseInt(port, 10),
  };
}
