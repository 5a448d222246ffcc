import { isIPv4, isIPv6 } from 'node:net';
import {
  CLASS_IN,
  DEFAULT_MX_PREFERENCE,
  MAX_RDATA_LENGTH,
  MAX_TXT_CHUNK,
  RECORD_TYPES,
  SUPPORTED_RECORD_TYPES,
} from './constants.js';
import type { SupportedRecordType } from './constants.js';
import { fqdn, resolveOwnerName } from './domain.js';
import { InvalidRecordValueError, UnsupportedRecordTypeError } from './errors.js';
import type { DnsRecord } from './provider.js';
import type { Rdata, WireRecord } from './types.js';
import { checkName, rcodeToString, typeToString } from './wire.js';

/**
 * Which name goes into the wire header.
 *
 * `zone` writes every record at the zone name passed to the operation,
 * `record` resolves the record's own name against the zone.
 */
export type OwnerNameMode = 'zone' | 'record';

export interface TranslateOptions {
  ownerName?: OwnerNameMode;
}

/** Record data the translator can produce */
type WritableRdata =
  | Extract<Rdata, { type: 'A' }>
  | Extract<Rdata, { type: 'AAAA' }>
  | { type: 'CNAME'; target: string }
  | Extract<Rdata, { type: 'MX' }>
  | Extract<Rdata, { type: 'TXT' }>;

/**
 * Convert a provider-neutral record into a wire record for `zone`.
 *
 * Throws {@link UnsupportedRecordTypeError} for types other than
 * A, AAAA, CNAME, MX and TXT, and {@link InvalidRecordValueError} when the
 * value cannot be encoded for its type.
 */
export function toWire(
  zone: string,
  record: DnsRecord,
  options: TranslateOptions = {}
): WireRecord {
  const type = record.type.trim().toUpperCase();
  if (!isSupportedRecordType(type)) {
    throw new UnsupportedRecordTypeError(record.type);
  }
  const rdata = toRdata(type, record);

  const name =
    options.ownerName === 'record'
      ? resolveOwnerName(record.name, zone)
      : fqdn(zone);
  const problem = checkName(name);
  if (problem) {
    throw new InvalidRecordValueError(rdata.type, name, `owner name: ${problem}`);
  }

  return {
    name,
    type: RECORD_TYPES[rdata.type],
    class: CLASS_IN,
    ttl: toUint32(record.ttl),
    rdata,
  };
}

function isSupportedRecordType(type: string): type is SupportedRecordType {
  return SUPPORTED_RECORD_TYPES.some((supported) => supported === type);
}

function toRdata(type: SupportedRecordType, record: DnsRecord): WritableRdata {
  const value = record.value.trim();

  switch (type) {
    case 'A':
      if (!isIPv4(value)) {
        throw new InvalidRecordValueError(type, record.value, 'not an IPv4 address');
      }
      return { type: 'A', address: value };
    case 'AAAA':
      if (!isIPv6(value) || value.includes('%')) {
        throw new InvalidRecordValueError(type, record.value, 'not an IPv6 address');
      }
      return { type: 'AAAA', address: value };
    case 'CNAME':
      return { type: 'CNAME', target: hostName(type, value) };
    case 'MX':
      return parseMx(value);
    case 'TXT': {
      const text = splitText(record.value);
      const size = text.reduce((sum, chunk) => sum + 1 + Buffer.byteLength(chunk), 0);
      if (size > MAX_RDATA_LENGTH) {
        throw new InvalidRecordValueError(
          type,
          record.value,
          `TXT data of ${size} octets exceeds ${MAX_RDATA_LENGTH}`
        );
      }
      return { type: 'TXT', text };
    }
  }
}

function hostName(type: string, value: string): string {
  if (!value) {
    throw new InvalidRecordValueError(type, value, 'missing host name');
  }
  const name = fqdn(value);
  const problem = checkName(name);
  if (problem) throw new InvalidRecordValueError(type, value, problem);
  return name;
}

/** Accepts `"<preference> <exchange>"` or a bare `"<exchange>"` */
function parseMx(value: string): Extract<Rdata, { type: 'MX' }> {
  const parts = value.split(/\s+/);

  if (parts.length === 1) {
    return {
      type: 'MX',
      preference: DEFAULT_MX_PREFERENCE,
      exchange: hostName('MX', parts[0] ?? ''),
    };
  }

  const [preference, exchange] = parts;
  if (parts.length > 2 || preference === undefined || exchange === undefined) {
    throw new InvalidRecordValueError('MX', value, 'expected "<preference> <exchange>"');
  }
  if (!/^\d+$/.test(preference) || Number(preference) > 0xffff) {
    throw new InvalidRecordValueError('MX', value, 'preference must be 0-65535');
  }
  return {
    type: 'MX',
    preference: Number(preference),
    exchange: hostName('MX', exchange),
  };
}

/** Split TXT data into character-strings of at most 255 octets */
function splitText(value: string): string[] {
  if (Buffer.byteLength(value) <= MAX_TXT_CHUNK) return [value];

  const chunks: string[] = [];
  let current = '';
  let size = 0;
  for (const char of value) {
    const length = Buffer.byteLength(char);
    if (size + length > MAX_TXT_CHUNK) {
      chunks.push(current);
      current = '';
      size = 0;
    }
    current += char;
    size += length;
  }
  if (current) chunks.push(current);
  return chunks;
}

function toUint32(seconds: number): number {
  return Number.isFinite(seconds) ? Math.trunc(seconds) >>> 0 : 0;
}

/** Convert a wire record back into a provider-neutral record */
export function fromWire(record: WireRecord): DnsRecord {
  return {
    name: record.name,
    type: typeToString(record.type),
    value: presentRdata(record.rdata),
    ttl: record.ttl,
  };
}

/** Canonical textual presentation of record data */
export function presentRdata(rdata: Rdata | undefined): string {
  if (!rdata) return '\\# 0';

  switch (rdata.type) {
    case 'A':
    case 'AAAA':
      return rdata.address;
    case 'CNAME':
    case 'NS':
    case 'PTR':
      return rdata.target;
    case 'MX':
      return `${rdata.preference} ${rdata.exchange}`;
    case 'TXT':
      return rdata.text.join('');
    case 'SOA':
      return [
        rdata.mname,
        rdata.rname,
        rdata.serial,
        rdata.refresh,
        rdata.retry,
        rdata.expire,
        rdata.minimum,
      ].join(' ');
    case 'SRV':
      return `${rdata.priority} ${rdata.weight} ${rdata.port} ${rdata.target}`;
    case 'TSIG':
      return [
        rdata.algorithm,
        rdata.timeSigned,
        rdata.fudge,
        rdata.mac.length,
        rdata.mac.toString('base64'),
        rdata.originalId,
        rcodeToString(rdata.error),
        rdata.other.length,
      ].join(' ');
    case 'UNKNOWN':
      return rdata.data.length
        ? `\\# ${rdata.data.length} ${rdata.data.toString('hex')}`
        : '\\# 0';
  }
}
