import { describe, it, expect } from 'vitest';
import { bytesToIPv4, bytesToIPv6, ipv4ToBytes, ipv6ToBytes } from '../src/ip.js';

describe('ipv4ToBytes', () => {
  it('encodes dotted quads', () => {
    expect([...ipv4ToBytes('192.0.2.1')]).toEqual([192, 0, 2, 1]);
  });

  it('rejects anything else', () => {
    expect(() => ipv4ToBytes('300.1.1.1')).toThrow(TypeError);
    expect(() => ipv4ToBytes('2001:db8::1')).toThrow('not an IPv4 address');
  });

  it('formats bytes back', () => {
    expect(bytesToIPv4(Buffer.from([198, 51, 100, 7]))).toBe('198.51.100.7');
  });
});

describe('ipv6ToBytes', () => {
  it('expands ::', () => {
    const bytes = ipv6ToBytes('2001:db8::1');
    expect(bytes.toString('hex')).toBe('20010db8000000000000000000000001');
  });

  it('handles the unspecified and loopback addresses', () => {
    expect(ipv6ToBytes('::').toString('hex')).toBe('0'.repeat(32));
    expect(ipv6ToBytes('::1').toString('hex')).toBe(`${'0'.repeat(31)}1`);
  });

  it('handles a dotted IPv4 tail', () => {
    expect(ipv6ToBytes('::ffff:192.0.2.1').toString('hex')).toBe(
      '00000000000000000000ffffc0000201'
    );
  });

  it('rejects anything else', () => {
    expect(() => ipv6ToBytes('192.0.2.1')).toThrow('not an IPv6 address');
  });
});

describe('bytesToIPv6', () => {
  it('compresses the longest zero run', () => {
    expect(bytesToIPv6(ipv6ToBytes('2001:0db8:0000:0000:0000:0000:0000:0001'))).toBe(
      '2001:db8::1'
    );
    expect(bytesToIPv6(ipv6ToBytes('2001:db8:0:0:1:0:0:0'))).toBe('2001:db8:0:0:1::');
  });

  it('compresses the first of equal runs', () => {
    expect(bytesToIPv6(ipv6ToBytes('2001:db8:0:0:1:0:0:1'))).toBe('2001:db8::1:0:0:1');
  });

  it('does not compress a single zero group', () => {
    expect(bytesToIPv6(ipv6ToBytes('2001:db8:0:1:1:1:1:1'))).toBe(
      '2001:db8:0:1:1:1:1:1'
    );
  });

  it('formats the edges', () => {
    expect(bytesToIPv6(Buffer.alloc(16))).toBe('::');
    expect(bytesToIPv6(ipv6ToBytes('::1'))).toBe('::1');
    expect(bytesToIPv6(ipv6ToBytes('2001:db8::'))).toBe('2001:db8::');
  });
});
