import { describe, expect, it } from 'vitest';
import {
  isPrivateIpv4,
  networkContains,
  networkHosts,
  numToIp,
  parseIpv4,
  parseNetwork,
} from './ip-utils.js';

describe('parseIpv4', () => {
  it('converts dotted quads to unsigned numbers', () => {
    expect(parseIpv4('0.0.0.0')).toBe(0);
    expect(parseIpv4('10.0.0.1')).toBe(167772161);
    expect(parseIpv4('255.255.255.255')).toBe(4294967295);
  });

  it.each(['256.1.1.1', '1.2.3', '1.2.3.4.5', 'a.b.c.d', ''])('rejects %j', (value) => {
    expect(parseIpv4(value)).toBeNull();
  });

  it('round-trips through numToIp', () => {
    expect(numToIp(3232235777)).toBe('192.168.1.1');
  });
});

describe('parseNetwork', () => {
  it('treats a bare address as /32', () => {
    expect(parseNetwork('10.1.2.3')).toMatchObject({ address: '10.1.2.3', prefix: 32 });
  });

  it('rejects host bits beyond the prefix', () => {
    expect(() => parseNetwork('192.168.1.5/24')).toThrow('has host bits set');
  });

  it('rejects an out of range prefix', () => {
    expect(() => parseNetwork('10.0.0.0/33')).toThrow('Invalid CIDR prefix');
  });

  it('handles /0 and /1 masks', () => {
    expect(parseNetwork('0.0.0.0/0').broadcast).toBe(4294967295);
    expect(parseNetwork('128.0.0.0/1').network).toBe(2147483648);
  });
});

describe('networkHosts', () => {
  it('drops network and broadcast addresses', () => {
    expect(networkHosts(parseNetwork('172.16.51.0/29'))).toEqual([
      '172.16.51.1',
      '172.16.51.2',
      '172.16.51.3',
      '172.16.51.4',
      '172.16.51.5',
      '172.16.51.6',
    ]);
  });

  it('keeps both addresses of a /31', () => {
    expect(networkHosts(parseNetwork('10.0.0.2/31'))).toEqual(['10.0.0.2', '10.0.0.3']);
  });

  it('yields the single address of a /32', () => {
    expect(networkHosts(parseNetwork('10.0.0.9/32'))).toEqual(['10.0.0.9']);
  });
});

describe('networkContains', () => {
  it('matches addresses inside the block', () => {
    const block = parseNetwork('192.168.1.96/28');
    expect(networkContains(block, '192.168.1.100')).toBe(true);
    expect(networkContains(block, '192.168.1.112')).toBe(false);
    expect(networkContains(block, 'not-an-ip')).toBe(false);
  });
});

describe('isPrivateIpv4', () => {
  it.each(['10.0.0.5', '172.16.51.1', '172.31.255.254', '192.168.0.1', '127.0.0.1', '169.254.10.10'])(
    '%s is private',
    (ip) => {
      expect(isPrivateIpv4(ip)).toBe(true);
    }
  );

  it.each(['8.8.8.8', '172.32.0.1', '93.184.216.34'])('%s is public', (ip) => {
    expect(isPrivateIpv4(ip)).toBe(false);
  });
});
