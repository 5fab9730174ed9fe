export interface Ipv4Network {
  address: string;
  prefix: number;
  network: number;
  broadcast: number;
}

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

// IANA special-purpose ranges treated as private (LAN) addresses
const PRIVATE_RANGES = [
  '0.0.0.0/8',
  '10.0.0.0/8',
  '127.0.0.0/8',
  '169.254.0.0/16',
  '172.16.0.0/12',
  '192.0.0.0/29',
  '192.0.0.170/31',
  '192.0.2.0/24',
  '192.168.0.0/16',
  '198.18.0.0/15',
  '198.51.100.0/24',
  '203.0.113.0/24',
  '240.0.0.0/4',
  '255.255.255.255/32',
];

/**
 * Convert a dotted-quad string to an unsigned 32-bit number, or null when malformed
 */
export function parseIpv4(value: string): number | null {
  const match = IPV4_PATTERN.exec(value);
  if (!match) return null;

  let num = 0;
  for (const part of match.slice(1)) {
    const octet = parseInt(part, 10);
    if (octet > 255) return null;
    num = num * 256 + octet;
  }
  return num;
}

/**
 * Convert number to IP address string
 */
export function numToIp(num: number): string {
  return [
    (num >>> 24) & 255,
    (num >>> 16) & 255,
    (num >>> 8) & 255,
    num & 255,
  ].join('.');
}

function prefixMask(prefix: number): number {
  return prefix === 0 ? 0 : (~((1 << (32 - prefix)) - 1)) >>> 0;
}

/**
 * Parse `a.b.c.d` or `a.b.c.d/prefix`. Host bits beyond the prefix are an error,
 * so `192.168.1.5/24` is rejected rather than silently widened.
 */
export function parseNetwork(cidr: string): Ipv4Network {
  const [ip = '', prefixStr, ...rest] = cidr.trim().split('/');
  if (rest.length > 0) {
    throw new Error(`Invalid network: ${cidr}`);
  }

  const ipNum = parseIpv4(ip);
  if (ipNum === null) {
    throw new Error(`Invalid IP address: ${ip}`);
  }

  let prefix = 32;
  if (prefixStr !== undefined) {
    if (!/^\d{1,2}$/.test(prefixStr)) {
      throw new Error(`Invalid CIDR prefix: ${prefixStr}`);
    }
    prefix = parseInt(prefixStr, 10);
    if (prefix > 32) {
      throw new Error(`Invalid CIDR prefix: ${prefix}`);
    }
  }

  const mask = prefixMask(prefix);
  const network = (ipNum & mask) >>> 0;
  if (network !== ipNum) {
    throw new Error(`${cidr} has host bits set`);
  }

  return {
    address: numToIp(network),
    prefix,
    network,
    broadcast: (network | ~mask) >>> 0,
  };
}

/**
 * Usable host addresses of a network in ascending order. Network and broadcast
 * addresses are dropped except for /31 and /32, which have none to spare.
 */
export function networkHosts(net: Ipv4Network): string[] {
  const start = net.prefix >= 31 ? net.network : net.network + 1;
  const end = net.prefix >= 31 ? net.broadcast : net.broadcast - 1;

  const ips: string[] = [];
  for (let i = start; i <= end; i++) {
    ips.push(numToIp(i));
  }
  return ips;
}

export function networkContains(net: Ipv4Network, ip: string): boolean {
  const num = parseIpv4(ip);
  if (num === null) return false;
  return ((num & prefixMask(net.prefix)) >>> 0) === net.network;
}

const PRIVATE_NETWORKS = PRIVATE_RANGES.map(parseNetwork);

export function isPrivateIpv4(ip: string): boolean {
  return PRIVATE_NETWORKS.some(net => networkContains(net, ip));
}
