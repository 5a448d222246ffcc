import { CLASS_IN, FLAG_RD, OPCODE_QUERY, RECORD_TYPES } from './constants.js';
import { fqdn } from './domain.js';
import type { DnsRecord } from './provider.js';
import { fromWire } from './records.js';
import type { Message } from './types.js';
import { encodeMessage } from './wire.js';

/** Encode an ANY query for the zone apex */
export function buildZoneQuery(zone: string, id: number): Buffer {
  return encodeMessage({
    id,
    flags: FLAG_RD,
    opcode: OPCODE_QUERY,
    rcode: 0,
    questions: [{ name: fqdn(zone), type: RECORD_TYPES.ANY, class: CLASS_IN }],
    answers: [],
    authorities: [],
    additionals: [],
  });
}

/** Answer records in server order, unfiltered */
export function recordsFromReply(reply: Message): DnsRecord[] {
  return reply.answers.map(fromWire);
}
