import { promises as dns } from 'dns';
import { InvalidTargetError, UnresolvableHostError, errorMessage } from '../utils/errors.js';
import { shuffle } from '../utils/shuffle.js';
import { networkContains, networkHosts, parseNetwork, type Ipv4Network } from '../utils/ip-utils.js';

// Largest network we are willing to expand into a host list
export const MIN_PREFIX = 8;

export type ForwardResolver = (hostname: string) => Promise<string>;

export interface EnumerateOptions {
  shuffle?: boolean | undefined;
  resolver?: ForwardResolver | undefined;
  random?: (() => number) | undefined;
}

export async function lookupIpv4(hostname: string): Promise<string> {
  const { address } = await dns.lookup(hostname, { family: 4 });
  return address;
}

export function isHostname(target: string): boolean {
  return /[a-z]/i.test(target);
}

/**
 * Expand a target expression (address, CIDR network or hostname) into the
 * addresses to scan.
 */
export async function enumerateHosts(target: string, options: EnumerateOptions = {}): Promise<string[]> {
  const trimmed = target.trim();

  if (isHostname(trimmed)) {
    const resolver = options.resolver ?? lookupIpv4;
    try {
      return [await resolver(trimmed)];
    } catch (error) {
      throw new UnresolvableHostError(trimmed, error);
    }
  }

  const net = parseTargetNetwork(trimmed);
  if (net.prefix < MIN_PREFIX) {
    throw new InvalidTargetError(trimmed, `networks larger than /${MIN_PREFIX} are not supported`);
  }

  const hosts = networkHosts(net);
  if (options.shuffle) {
    shuffle(hosts, options.random);
  }
  return hosts;
}

export function parseTargetNetwork(target: string): Ipv4Network {
  try {
    return parseNetwork(target);
  } catch (error) {
    throw new InvalidTargetError(target, errorMessage(error));
  }
}

export function parseExcludedNetwork(cidr: string | undefined): Ipv4Network | null {
  if (cidr === undefined || cidr.trim() === '') return null;
  return parseTargetNetwork(cidr.trim());
}

export function isExcludedHost(host: string, excluded: Ipv4Network | null): boolean {
  return excluded !== null && networkContains(excluded, host);
}
