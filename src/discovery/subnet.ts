/**
 * IPv4 helpers for subnet enumeration.
 */

export interface Ipv4Network {
  address: string;
  prefix: number;
}

export function parseIpv4(ip: string): number | null {
  const parts = ip.trim().split('.');
  if (parts.length !== 4) return null;

  let value = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return null;
    const octet = Number(part);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function formatIpv4(value: number): string {
  return [
    Math.floor(value / 0x1000000) % 256,
    Math.floor(value / 0x10000) % 256,
    Math.floor(value / 0x100) % 256,
    value % 256,
  ].join('.');
}

export function isIpv4(ip: string): boolean {
  return parseIpv4(ip) !== null;
}

/**
 * Parses "192.168.1.10/24".
 */
export function parseCidr(cidr: string): Ipv4Network | null {
  const [address, prefixStr, ...rest] = cidr.trim().split('/');
  if (rest.length > 0 || prefixStr === undefined || !/^\d{1,2}$/.test(prefixStr)) return null;
  const prefix = Number(prefixStr);
  if (prefix > 32 || parseIpv4(address) === null) return null;
  return { address, prefix };
}

/**
 * Every usable host address of the network, in ascending order.
 * Network and broadcast addresses are excluded except for /31 and /32,
 * whose addresses are all hosts.
 */
export function hostAddresses(network: Ipv4Network): string[] {
  const base = parseIpv4(network.address);
  if (base === null) return [];

  const size = 2 ** (32 - network.prefix);
  const start = base - (base % size);

  if (network.prefix >= 31) {
    return Array.from({ length: size }, (_, i) => formatIpv4(start + i));
  }

  const hosts: string[] = [];
  for (let i = 1; i < size - 1; i++) {
    hosts.push(formatIpv4(start + i));
  }
  return hosts;
}

/**
 * Plain string ordering of dotted-decimal addresses ("10.0.0.10" sorts
 * before "10.0.0.2"). Node order derived from this is displayed and used for
 * the worker enumeration order.
 */
export function sortAddresses(addresses: Iterable<string>): string[] {
  return Array.from(new Set(addresses)).sort();
}
