import type { IncomingMessage } from 'node:http';
import { isIPv6 } from 'node:net';

/** Strips the port from a Host header, keeping bracketed IPv6 literals intact. */
export function hostWithoutPort(host: string): string {
  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    return end >= 0 ? host.slice(0, end + 1) : host;
  }
  return host.split(':')[0];
}

/**
 * Host a peer reached this process on: the Host header it sent, else the
 * local address of its connection. Never a wildcard bind address.
 */
export function requestHost(req: IncomingMessage): string {
  const header = hostWithoutPort(req.headers.host ?? '');
  if (header && header !== '0.0.0.0' && header !== '[::]') {
    return header;
  }
  const local = req.socket.localAddress;
  if (!local) {
    return 'localhost';
  }
  const mapped = local.startsWith('::ffff:') ? local.slice('::ffff:'.length) : local;
  return isIPv6(mapped) ? `[${mapped}]` : mapped;
}
