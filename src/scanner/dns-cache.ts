import { promises as dns } from 'dns';

export type ReverseResolver = (ip: string) => Promise<string[]>;

export interface DnsCacheOptions {
  timeout: number;
  resolver?: ReverseResolver | undefined;
}

// getnameinfo goes through the system resolver, hosts file included
async function lookupHostname(ip: string): Promise<string[]> {
  const { hostname } = await dns.lookupService(ip, 0);
  return hostname === ip ? [] : [hostname];
}

/**
 * Reverse DNS names keyed by address. Lookups are best effort: a failure, or
 * no answer within `timeout` ms, yields (and caches) the empty name. Two
 * concurrent misses for the same address may both hit the resolver.
 */
export class DnsCache {
  readonly timeout: number;
  private readonly names = new Map<string, string>();
  private readonly resolver: ReverseResolver;

  constructor(options: DnsCacheOptions) {
    if (!(options.timeout > 0)) {
      throw new RangeError(`DNS timeout must be positive, got ${options.timeout}`);
    }
    this.timeout = options.timeout;
    this.resolver = options.resolver ?? lookupHostname;
  }

  async reverse(ip: string): Promise<string> {
    const cached = this.names.get(ip);
    if (cached !== undefined) return cached;

    let name = '';
    try {
      name = await this.lookup(ip);
    } catch {
      // unresolvable addresses are reported without a name
    }

    this.names.set(ip, name);
    return name;
  }

  has(ip: string): boolean {
    return this.names.has(ip);
  }

  get size(): number {
    return this.names.size;
  }

  private async lookup(ip: string): Promise<string> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<string[]>((resolve) => {
      timer = setTimeout(() => resolve([]), this.timeout);
    });

    try {
      const hostnames = await Promise.race([this.resolver(ip), expired]);
      return hostnames[0] ?? '';
    } finally {
      clearTimeout(timer);
    }
  }
}
