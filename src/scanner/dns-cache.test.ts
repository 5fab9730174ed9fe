import { describe, expect, it, vi } from 'vitest';
import { DnsCache } from './dns-cache.js';

describe('DnsCache', () => {
  it('returns the first name and resolves each address once', async () => {
    const resolver = vi.fn(async (ip: string) => [`host-${ip.split('.').join('-')}.lan`, 'alias.lan']);
    const cache = new DnsCache({ timeout: 1000, resolver });

    await expect(cache.reverse('192.168.1.10')).resolves.toBe('host-192-168-1-10.lan');
    await expect(cache.reverse('192.168.1.10')).resolves.toBe('host-192-168-1-10.lan');

    expect(resolver).toHaveBeenCalledTimes(1);
    expect(cache.has('192.168.1.10')).toBe(true);
    expect(cache.size).toBe(1);
  });

  it('caches a failed lookup as the empty name', async () => {
    const resolver = vi.fn(async (): Promise<string[]> => {
      throw new Error('getHostByAddr ENOTFOUND');
    });
    const cache = new DnsCache({ timeout: 1000, resolver });

    await expect(cache.reverse('10.1.2.3')).resolves.toBe('');
    await expect(cache.reverse('10.1.2.3')).resolves.toBe('');

    expect(resolver).toHaveBeenCalledTimes(1);
  });

  it('treats an empty answer as no name', async () => {
    const cache = new DnsCache({ timeout: 1000, resolver: async () => [] });

    await expect(cache.reverse('10.1.2.4')).resolves.toBe('');
    expect(cache.has('10.1.2.4')).toBe(true);
  });

  it('gives up on a lookup that outlasts the timeout', async () => {
    const cache = new DnsCache({ timeout: 20, resolver: () => new Promise<string[]>(() => {}) });
    const started = Date.now();

    await expect(cache.reverse('10.1.2.5')).resolves.toBe('');

    expect(Date.now() - started).toBeLessThan(500);
    expect(cache.has('10.1.2.5')).toBe(true);
  });

  it('keeps an answer that arrives within the timeout', async () => {
    const cache = new DnsCache({
      timeout: 500,
      resolver: () => new Promise<string[]>((resolve) => setTimeout(() => resolve(['slow.lan']), 10)),
    });

    await expect(cache.reverse('10.1.2.6')).resolves.toBe('slow.lan');
  });

  it('rejects a non-positive timeout', () => {
    expect(() => new DnsCache({ timeout: 0 })).toThrow(RangeError);
  });
});
