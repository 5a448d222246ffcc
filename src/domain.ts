import { isIPv6 } from 'node:net';
import { DEFAULT_DNS_PORT } from './constants.js';

/**
 * Make a domain name fully qualified.
 *
 * Examples:
 * - `example.org` → `example.org.`
 * - `example.org.` → `example.org.`
 * - `` → `.`
 */
export function fqdn(name: string): string {
  const trimmed = name.trim();
  return trimmed.endsWith('.') ? trimmed : `${trimmed}.`;
}

/**
 * Resolve a record name against its zone.
 *
 * `@` and the empty name mean the zone apex, names with a trailing dot are
 * already absolute, anything else is relative to the zone.
 */
export function resolveOwnerName(name: string, zone: string): string {
  const trimmed = name.trim();
  const origin = fqdn(zone);
  if (trimmed === '' || trimmed === '@') return origin;
  if (trimmed.endsWith('.')) return trimmed;
  return origin === '.' ? `${trimmed}.` : `${trimmed}.${origin}`;
}

export type HostPort =
  | { ok: true; host: string; port: string }
  | {
      ok: false;
      reason:
        | 'missing port'
        | 'too many colons'
        | "missing ']'"
        | "unexpected '['"
        | "unexpected ']'";
    };

/**
 * Split `host:port`, `[v6]:port` into host and port.
 *
 * Brackets are stripped from IPv6 hosts; the port may be empty (`host:`).
 */
export function splitHostPort(address: string): HostPort {
  const lastColon = address.lastIndexOf(':');
  if (lastColon < 0) return { ok: false, reason: 'missing port' };

  let host: string;
  let hostStart = 0;
  let portStart = 0;

  if (address.startsWith('[')) {
    const end = address.indexOf(']');
    if (end < 0) return { ok: false, reason: "missing ']'" };
    if (end + 1 === address.length) return { ok: false, reason: 'missing port' };
    if (end + 1 !== lastColon) {
      return address[end + 1] === ':'
        ? { ok: false, reason: 'too many colons' }
        : { ok: false, reason: 'missing port' };
    }
    host = address.slice(1, end);
    hostStart = 1;
    portStart = end + 1;
  } else {
    host = address.slice(0, lastColon);
    if (host.includes(':')) return { ok: false, reason: 'too many colons' };
  }

  if (address.slice(hostStart).includes('[')) {
    return { ok: false, reason: "unexpected '['" };
  }
  if (address.slice(portStart).includes(']')) {
    return { ok: false, reason: "unexpected ']'" };
  }

  return { ok: true, host, port: address.slice(lastColon + 1) };
}

/** Join host and port, bracketing IPv6 hosts */
export function joinHostPort(host: string, port: string): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * Append the default DNS port to a nameserver address that has none.
 *
 * Addresses with a port are returned unchanged. Malformed addresses are also
 * returned unchanged so that the transport reports the real failure; use
 * {@link isNormalizable} to tell the two apart.
 *
 * Examples:
 * - `ns.example.org` → `ns.example.org:53`
 * - `ns.example.org:5353` → `ns.example.org:5353`
 * - `2001:db8::53` → `[2001:db8::53]:53`
 * - `[2001:db8::53]` → `[2001:db8::53]:53`
 */
export function normalizeNameserver(address: string): string {
  const parts = splitHostPort(address);
  if (parts.ok) return address;

  if (parts.reason === 'missing port') {
    if (address.startsWith('[') && address.endsWith(']')) {
      return `${address}:${DEFAULT_DNS_PORT}`;
    }
    return joinHostPort(address, DEFAULT_DNS_PORT);
  }
  if (parts.reason === 'too many colons' && isIPv6(address)) {
    return joinHostPort(address, DEFAULT_DNS_PORT);
  }
  return address;
}

/** Whether {@link normalizeNameserver} yields a well-formed `host:port` */
export function isNormalizable(address: string): boolean {
  return splitHostPort(normalizeNameserver(address)).ok;
}
