import {
  CLASS_ANY,
  CLASS_IN,
  CLASS_NONE,
  OPCODE_UPDATE,
  RECORD_TYPES,
} from './constants.js';
import { fqdn } from './domain.js';
import type { UpdateOperation } from './errors.js';
import type { DnsRecord } from './provider.js';
import { toWire } from './records.js';
import type { TranslateOptions } from './records.js';
import type { Removal, UpdateTransaction, WireRecord } from './types.js';
import { encodeMessage } from './wire.js';

/**
 * Build the update transaction for a single record.
 *
 * - `append` inserts the record and leaves existing data alone
 * - `delete` removes the one record matching name, type and value
 * - `set` removes the whole RRset for the name and type, then inserts the
 *   record, so exactly one value remains afterwards
 */
export function buildTransaction(
  zone: string,
  record: DnsRecord,
  operation: UpdateOperation,
  options: TranslateOptions = {}
): UpdateTransaction {
  const rr = toWire(zone, record, options);
  const origin = fqdn(zone);

  switch (operation) {
    case 'append':
      return { zone: origin, removals: [], insertions: [rr] };
    case 'delete':
      return {
        zone: origin,
        removals: [{ kind: 'record', record: rr }],
        insertions: [],
      };
    case 'set':
      return {
        zone: origin,
        removals: [{ kind: 'rrset', name: rr.name, type: rr.type }],
        insertions: [rr],
      };
  }
}

/** RFC 2136 §2.5 update-section form of a removal directive */
function removalRecord(removal: Removal): WireRecord {
  switch (removal.kind) {
    case 'rrset':
      return { name: removal.name, type: removal.type, class: CLASS_ANY, ttl: 0 };
    case 'record':
      return { ...removal.record, class: CLASS_NONE, ttl: 0 };
  }
}

/** Encode a transaction as an UPDATE message; removals precede insertions */
export function encodeTransaction(tx: UpdateTransaction, id: number): Buffer {
  return encodeMessage({
    id,
    flags: 0,
    opcode: OPCODE_UPDATE,
    rcode: 0,
    questions: [{ name: tx.zone, type: RECORD_TYPES.SOA, class: CLASS_IN }],
    answers: [],
    authorities: [...tx.removals.map(removalRecord), ...tx.insertions],
    additionals: [],
  });
}
