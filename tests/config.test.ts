import { describe, it, expect } from 'vitest';
import { parseRfc2136Config, serializeRfc2136Config } from '../src/config.js';

describe('parseRfc2136Config', () => {
  it('maps the JSON keys', () => {
    expect(
      parseRfc2136Config({
        nameserver: 'ns.example.org:53',
        tsig_algorithm: 'hmac-sha256',
        tsig_keyname: 'update-key',
        tsig_secret: 'dGVzdC1zZWNyZXQ=',
      })
    ).toEqual({
      nameserver: 'ns.example.org:53',
      tsigAlgorithm: 'hmac-sha256',
      tsigKeyName: 'update-key',
      tsigSecret: 'dGVzdC1zZWNyZXQ=',
    });
  });

  it('omits empty optional fields', () => {
    expect(
      parseRfc2136Config({ nameserver: '192.0.2.53', tsig_keyname: '', tsig_secret: null })
    ).toEqual({ nameserver: '192.0.2.53' });
  });

  it('parses the output of JSON.parse', () => {
    const config = parseRfc2136Config(
      JSON.parse('{"nameserver":"[2001:db8::53]:53","tsig_algorithm":"hmac-sha512"}')
    );
    expect(config).toEqual({ nameserver: '[2001:db8::53]:53', tsigAlgorithm: 'hmac-sha512' });
  });

  it('requires a nameserver', () => {
    expect(() => parseRfc2136Config({})).toThrow('RFC2136: nameserver is required');
    expect(() => parseRfc2136Config({ nameserver: '  ' })).toThrow(
      'RFC2136: nameserver is required'
    );
  });

  it('rejects non-objects and non-string fields', () => {
    expect(() => parseRfc2136Config('ns.example.org')).toThrow(
      'RFC2136: configuration must be a JSON object'
    );
    expect(() => parseRfc2136Config([])).toThrow(
      'RFC2136: configuration must be a JSON object'
    );
    expect(() => parseRfc2136Config({ nameserver: 'ns', tsig_secret: 42 })).toThrow(
      'RFC2136: tsig_secret must be a string'
    );
  });
});

describe('serializeRfc2136Config', () => {
  it('writes the JSON keys and omits empty fields', () => {
    expect(
      serializeRfc2136Config({
        nameserver: 'ns.example.org',
        tsigKeyName: 'update-key',
        tsigSecret: '',
      })
    ).toEqual({ nameserver: 'ns.example.org', tsig_keyname: 'update-key' });
  });

  it('round-trips through JSON', () => {
    const config = {
      nameserver: 'ns.example.org:5353',
      tsigAlgorithm: 'hmac-sha1',
      tsigKeyName: 'update-key',
      tsigSecret: 'dGVzdC1zZWNyZXQ=',
    };
    expect(
      parseRfc2136Config(JSON.parse(JSON.stringify(serializeRfc2136Config(config))))
    ).toEqual(config);
  });
});
