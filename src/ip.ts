import { isIP } from 'node:net';
import { ApiDecodeError } from './errors.js';

export interface IpAddress {
  version: 4 | 6;
  /** The literal as given */
  address: string;
  /** Full form; IPv6 is expanded to eight zero-padded groups */
  exploded: string;
}

function ipv4ToGroups(ipv4: string): string[] {
  const octets = ipv4.split('.').map((o) => Number.parseInt(o, 10));
  const [a = 0, b = 0, c = 0, d = 0] = octets;
  return [((a << 8) | b).toString(16), ((c << 8) | d).toString(16)];
}

function splitGroups(part: string): string[] {
  return part ? part.split(':') : [];
}

/**
 * Expand an IPv6 literal, e.g. "2001:db8::1" →
 * "2001:0db8:0000:0000:0000:0000:0000:0001". Expects a literal `isIP` accepted.
 */
export function explodeIpv6(address: string): string {
  const [withoutZone = address] = address.split('%');
  const [head = '', tail] = withoutZone.split('::');

  // Embedded IPv4 tail, e.g. ::ffff:192.0.2.1
  const expandV4 = (part: string) => {
    const groups = splitGroups(part);
    const last = groups[groups.length - 1];
    if (last !== undefined && last.includes('.')) {
      return [...groups.slice(0, -1), ...ipv4ToGroups(last)];
    }
    return groups;
  };

  let groups: string[];
  if (tail === undefined) {
    groups = expandV4(head);
  } else {
    const headGroups = expandV4(head);
    const tailGroups = expandV4(tail);
    const missing = 8 - headGroups.length - tailGroups.length;
    groups = [...headGroups, ...Array<string>(missing).fill('0'), ...tailGroups];
  }

  return groups.map((g) => g.toLowerCase().padStart(4, '0')).join(':');
}

/** Parse an IP literal into a typed IPv4/IPv6 value. Whitespace is not stripped. */
export function parseIpAddress(address: string): IpAddress {
  const version = isIP(address);

  if (version === 4) {
    return { version, address, exploded: address };
  }
  if (version === 6) {
    return { version, address, exploded: explodeIpv6(address) };
  }

  throw new ApiDecodeError(`"${address}" is not a valid IP address`);
}
