import { describe, it, expect } from 'vitest';
import { CLASS_IN, FLAG_QR, FLAG_RD, OPCODE_QUERY, RECORD_TYPES } from '../src/constants.js';
import { buildZoneQuery, recordsFromReply } from '../src/query.js';
import { decodeMessage } from '../src/wire.js';

describe('buildZoneQuery', () => {
  it('asks for every type at the zone apex', () => {
    const query = decodeMessage(buildZoneQuery('example.org', 5));

    expect(query.id).toBe(5);
    expect(query.opcode).toBe(OPCODE_QUERY);
    expect(query.flags).toBe(FLAG_RD);
    expect(query.questions).toEqual([
      { name: 'example.org.', type: RECORD_TYPES.ANY, class: CLASS_IN },
    ]);
  });
});

describe('recordsFromReply', () => {
  it('converts answers without filtering', () => {
    const records = recordsFromReply({
      id: 5,
      flags: FLAG_QR,
      opcode: OPCODE_QUERY,
      rcode: 0,
      questions: [],
      answers: [
        {
          name: 'example.org.',
          type: RECORD_TYPES.CNAME,
          class: CLASS_IN,
          ttl: 60,
          rdata: { type: 'CNAME', target: 'alias.example.net.' },
        },
        {
          name: 'example.org.',
          type: RECORD_TYPES.SRV,
          class: CLASS_IN,
          ttl: 60,
          rdata: { type: 'SRV', priority: 0, weight: 5, port: 443, target: 'web.example.org.' },
        },
      ],
      authorities: [],
      additionals: [],
    });

    expect(records).toEqual([
      { name: 'example.org.', type: 'CNAME', value: 'alias.example.net.', ttl: 60 },
      { name: 'example.org.', type: 'SRV', value: '0 5 443 web.example.org.', ttl: 60 },
    ]);
  });
});
