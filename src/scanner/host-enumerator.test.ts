import { describe, expect, it } from 'vitest';
import { InvalidTargetError, UnresolvableHostError } from '../utils/errors.js';
import {
  enumerateHosts,
  isExcludedHost,
  isHostname,
  parseExcludedNetwork,
} from './host-enumerator.js';

describe('enumerateHosts', () => {
  it('expands a network to its usable hosts in ascending order', async () => {
    await expect(enumerateHosts('10.0.0.0/30')).resolves.toEqual(['10.0.0.1', '10.0.0.2']);
  });

  it('yields a single address for a bare IP', async () => {
    await expect(enumerateHosts('10.0.0.5')).resolves.toEqual(['10.0.0.5']);
  });

  it('yields a single address for a /32', async () => {
    await expect(enumerateHosts('10.0.0.5/32')).resolves.toEqual(['10.0.0.5']);
  });

  it('only permutes the host set when shuffling', async () => {
    const ordered = await enumerateHosts('192.168.7.0/26');
    const shuffled = await enumerateHosts('192.168.7.0/26', { shuffle: true });

    expect(shuffled).toHaveLength(62);
    expect([...shuffled].sort()).toEqual([...ordered].sort());
  });

  it('shuffles with the supplied random source', async () => {
    // always picking index 0 rotates the list left by one
    const hosts = await enumerateHosts('10.0.0.0/29', { shuffle: true, random: () => 0 });
    expect(hosts).toEqual(['10.0.0.2', '10.0.0.3', '10.0.0.4', '10.0.0.5', '10.0.0.6', '10.0.0.1']);
  });

  it('resolves hostnames through the forward resolver', async () => {
    const hosts = await enumerateHosts('scanme.test', {
      resolver: async (hostname) => (hostname === 'scanme.test' ? '10.9.8.7' : '0.0.0.0'),
    });
    expect(hosts).toEqual(['10.9.8.7']);
  });

  it('fails with UnresolvableHostError when the lookup fails', async () => {
    const lookup = enumerateHosts('missing.test', {
      resolver: async () => {
        throw new Error('getaddrinfo ENOTFOUND missing.test');
      },
    });
    await expect(lookup).rejects.toBeInstanceOf(UnresolvableHostError);
  });

  it.each(['10.0.0.300', '10.0.0.0/40', '10.0.0.1/24', '1.2.3'])('rejects %j', async (target) => {
    await expect(enumerateHosts(target)).rejects.toBeInstanceOf(InvalidTargetError);
  });

  it('rejects networks larger than /8', async () => {
    await expect(enumerateHosts('0.0.0.0/4')).rejects.toThrow('networks larger than /8 are not supported');
  });
});

describe('isHostname', () => {
  it('detects alphabetic characters', () => {
    expect(isHostname('www.example.com')).toBe(true);
    expect(isHostname('192.168.1.0/24')).toBe(false);
  });
});

describe('excluded networks', () => {
  it('matches hosts inside the excluded block', () => {
    const excluded = parseExcludedNetwork('192.168.1.96/28');
    expect(isExcludedHost('192.168.1.97', excluded)).toBe(true);
    expect(isExcludedHost('192.168.1.95', excluded)).toBe(false);
  });

  it('excludes nothing without a block', () => {
    expect(parseExcludedNetwork(undefined)).toBeNull();
    expect(isExcludedHost('10.0.0.1', null)).toBe(false);
  });

  it('rejects a malformed block', () => {
    expect(() => parseExcludedNetwork('192.168.1.96/99')).toThrow(InvalidTargetError);
  });
});
