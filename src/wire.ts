import { RCODE_NAMES, RECORD_TYPES } from './constants.js';
import { fqdn } from './domain.js';
import { MalformedMessageError } from './errors.js';
import { bytesToIPv4, bytesToIPv6, ipv4ToBytes, ipv6ToBytes } from './ip.js';
import type {
  DecodedMessage,
  Message,
  Question,
  Rdata,
  WireRecord,
} from './types.js';

const HEADER_SIZE = 12;
const MAX_NAME_LENGTH = 255;
const MAX_LABEL_LENGTH = 63;
const POINTER_MASK = 0xc0;
const FLAGS_MASK = 0x87f0;
const MAX_U16 = 0xffff;

const TYPE_NAMES = new Map<number, string>(
  Object.entries(RECORD_TYPES).map(([name, code]) => [code, name])
);

/** Mnemonic for an RR type code; unknown codes render as `TYPE<n>` */
export function typeToString(code: number): string {
  return TYPE_NAMES.get(code) ?? `TYPE${code}`;
}

/** Textual name of a response code; unknown codes render as `RCODE<n>` */
export function rcodeToString(code: number): string {
  return RCODE_NAMES[code] ?? `RCODE${code}`;
}

/** Why a domain name cannot be encoded, or undefined when it can */
export function checkName(name: string): string | undefined {
  const absolute = fqdn(name);
  if (absolute === '.') return undefined;

  // Length octet per label plus the root
  let encoded = 1;
  for (const label of absolute.slice(0, -1).split('.')) {
    if (label.length === 0) return 'empty label';
    const size = Buffer.byteLength(label);
    if (size > MAX_LABEL_LENGTH) return `label "${label}" exceeds 63 octets`;
    encoded += size + 1;
  }
  return encoded > MAX_NAME_LENGTH ? 'name exceeds 255 octets' : undefined;
}

/** Encode a domain name as uncompressed labels */
export function encodeName(name: string): Buffer {
  const problem = checkName(name);
  if (problem) throw new RangeError(`cannot encode name "${name}": ${problem}`);

  const absolute = fqdn(name);
  if (absolute === '.') return Buffer.from([0]);

  const parts: Buffer[] = [];
  for (const label of absolute.slice(0, -1).split('.')) {
    const bytes = Buffer.from(label, 'utf8');
    parts.push(Buffer.from([bytes.length]), bytes);
  }
  parts.push(Buffer.from([0]));
  return Buffer.concat(parts);
}

function u16(value: number): Buffer {
  if (!Number.isInteger(value) || value < 0 || value > MAX_U16) {
    throw new RangeError(`${value} does not fit in 16 bits`);
  }
  const buf = Buffer.alloc(2);
  buf.writeUInt16BE(value);
  return buf;
}

function u32(value: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32BE(value >>> 0);
  return buf;
}

function u48(value: number): Buffer {
  const buf = Buffer.alloc(6);
  buf.writeUIntBE(value, 0, 6);
  return buf;
}

export function encodeRdata(rdata: Rdata): Buffer {
  switch (rdata.type) {
    case 'A':
      return ipv4ToBytes(rdata.address);
    case 'AAAA':
      return ipv6ToBytes(rdata.address);
    case 'CNAME':
    case 'NS':
    case 'PTR':
      return encodeName(rdata.target);
    case 'MX':
      return Buffer.concat([u16(rdata.preference), encodeName(rdata.exchange)]);
    case 'TXT':
      return Buffer.concat(
        rdata.text.flatMap((chunk) => {
          const bytes = Buffer.from(chunk, 'utf8');
          if (bytes.length > 255) {
            throw new RangeError('TXT chunk exceeds 255 octets');
          }
          return [Buffer.from([bytes.length]), bytes];
        })
      );
    case 'SOA':
      return Buffer.concat([
        encodeName(rdata.mname),
        encodeName(rdata.rname),
        u32(rdata.serial),
        u32(rdata.refresh),
        u32(rdata.retry),
        u32(rdata.expire),
        u32(rdata.minimum),
      ]);
    case 'SRV':
      return Buffer.concat([
        u16(rdata.priority),
        u16(rdata.weight),
        u16(rdata.port),
        encodeName(rdata.target),
      ]);
    case 'TSIG':
      return Buffer.concat([
        encodeName(rdata.algorithm),
        u48(rdata.timeSigned),
        u16(rdata.fudge),
        u16(rdata.mac.length),
        rdata.mac,
        u16(rdata.originalId),
        u16(rdata.error),
        u16(rdata.other.length),
        rdata.other,
      ]);
    case 'UNKNOWN':
      return rdata.data;
  }
}

export function encodeRecord(record: WireRecord): Buffer {
  const rdata = record.rdata ? encodeRdata(record.rdata) : Buffer.alloc(0);
  if (rdata.length > MAX_U16) {
    throw new RangeError(`RDATA of ${rdata.length} octets exceeds 65535`);
  }
  return Buffer.concat([
    encodeName(record.name),
    u16(record.type),
    u16(record.class),
    u32(record.ttl),
    u16(rdata.length),
    rdata,
  ]);
}

function encodeQuestion(question: Question): Buffer {
  return Buffer.concat([
    encodeName(question.name),
    u16(question.type),
    u16(question.class),
  ]);
}

/** Encode a full message; names are written without compression */
export function encodeMessage(message: Message): Buffer {
  const header = Buffer.alloc(HEADER_SIZE);
  header.writeUInt16BE(message.id & 0xffff, 0);
  header.writeUInt16BE(
    (message.flags & FLAGS_MASK) |
      ((message.opcode & 0xf) << 11) |
      (message.rcode & 0xf),
    2
  );
  header.writeUInt16BE(message.questions.length, 4);
  header.writeUInt16BE(message.answers.length, 6);
  header.writeUInt16BE(message.authorities.length, 8);
  header.writeUInt16BE(message.additionals.length, 10);

  return Buffer.concat([
    header,
    ...message.questions.map(encodeQuestion),
    ...message.answers.map(encodeRecord),
    ...message.authorities.map(encodeRecord),
    ...message.additionals.map(encodeRecord),
  ]);
}

/** Read a possibly compressed name; returns it with the offset after it */
export function readName(
  buf: Buffer,
  offset: number
): { name: string; next: number } {
  const labels: string[] = [];
  let cursor = offset;
  let next = -1;
  let jumps = 0;

  for (;;) {
    const length = buf.readUInt8(cursor);
    if ((length & POINTER_MASK) === POINTER_MASK) {
      const pointer = buf.readUInt16BE(cursor) & 0x3fff;
      if (next < 0) next = cursor + 2;
      if (++jumps > 127 || pointer >= buf.length) {
        throw new MalformedMessageError('bad compression pointer');
      }
      cursor = pointer;
      continue;
    }
    if (length & POINTER_MASK) {
      throw new MalformedMessageError(`bad label length ${length}`);
    }
    if (length === 0) {
      cursor += 1;
      break;
    }
    const end = cursor + 1 + length;
    if (end > buf.length) throw new MalformedMessageError('label overruns message');
    labels.push(buf.toString('utf8', cursor + 1, end));
    cursor = end;
  }

  return {
    name: labels.length ? `${labels.join('.')}.` : '.',
    next: next < 0 ? cursor : next,
  };
}

function decodeRdata(
  type: number,
  buf: Buffer,
  start: number,
  length: number
): Rdata {
  const end = start + length;
  const data = buf.subarray(start, end);

  switch (type) {
    case RECORD_TYPES.A:
      if (length !== 4) throw new MalformedMessageError('A RDATA must be 4 octets');
      return { type: 'A', address: bytesToIPv4(data) };
    case RECORD_TYPES.AAAA:
      if (length !== 16) {
        throw new MalformedMessageError('AAAA RDATA must be 16 octets');
      }
      return { type: 'AAAA', address: bytesToIPv6(data) };
    case RECORD_TYPES.CNAME:
      return { type: 'CNAME', target: readName(buf, start).name };
    case RECORD_TYPES.NS:
      return { type: 'NS', target: readName(buf, start).name };
    case RECORD_TYPES.PTR:
      return { type: 'PTR', target: readName(buf, start).name };
    case RECORD_TYPES.MX:
      return {
        type: 'MX',
        preference: buf.readUInt16BE(start),
        exchange: readName(buf, start + 2).name,
      };
    case RECORD_TYPES.TXT: {
      const text: string[] = [];
      let cursor = start;
      while (cursor < end) {
        const size = buf.readUInt8(cursor);
        if (cursor + 1 + size > end) {
          throw new MalformedMessageError('TXT chunk overruns RDATA');
        }
        text.push(buf.toString('utf8', cursor + 1, cursor + 1 + size));
        cursor += 1 + size;
      }
      return { type: 'TXT', text };
    }
    case RECORD_TYPES.SOA: {
      const mname = readName(buf, start);
      const rname = readName(buf, mname.next);
      const at = rname.next;
      return {
        type: 'SOA',
        mname: mname.name,
        rname: rname.name,
        serial: buf.readUInt32BE(at),
        refresh: buf.readUInt32BE(at + 4),
        retry: buf.readUInt32BE(at + 8),
        expire: buf.readUInt32BE(at + 12),
        minimum: buf.readUInt32BE(at + 16),
      };
    }
    case RECORD_TYPES.SRV:
      return {
        type: 'SRV',
        priority: buf.readUInt16BE(start),
        weight: buf.readUInt16BE(start + 2),
        port: buf.readUInt16BE(start + 4),
        target: readName(buf, start + 6).name,
      };
    case RECORD_TYPES.TSIG: {
      const algorithm = readName(buf, start);
      let at = algorithm.next;
      const timeSigned = buf.readUIntBE(at, 6);
      const fudge = buf.readUInt16BE(at + 6);
      const macSize = buf.readUInt16BE(at + 8);
      at += 10;
      const mac = Buffer.from(buf.subarray(at, at + macSize));
      at += macSize;
      const originalId = buf.readUInt16BE(at);
      const error = buf.readUInt16BE(at + 2);
      const otherSize = buf.readUInt16BE(at + 4);
      const other = Buffer.from(buf.subarray(at + 6, at + 6 + otherSize));
      return {
        type: 'TSIG',
        algorithm: algorithm.name,
        timeSigned,
        fudge,
        mac,
        originalId,
        error,
        other,
      };
    }
    default:
      return { type: 'UNKNOWN', data: Buffer.from(data) };
  }
}

function readRecord(
  buf: Buffer,
  offset: number
): { record: WireRecord; next: number } {
  const { name, next } = readName(buf, offset);
  const type = buf.readUInt16BE(next);
  const klass = buf.readUInt16BE(next + 2);
  const ttl = buf.readUInt32BE(next + 4);
  const length = buf.readUInt16BE(next + 8);
  const start = next + 10;
  if (start + length > buf.length) {
    throw new MalformedMessageError('RDATA overruns message');
  }

  const record: WireRecord = { name, type, class: klass, ttl };
  if (length > 0) record.rdata = decodeRdata(type, buf, start, length);
  return { record, next: start + length };
}

/**
 * Decode a DNS message.
 *
 * When the last additional record is a TSIG, `tsigOffset` points at its
 * first octet so the signature can be checked against the preceding bytes.
 */
export function decodeMessage(buf: Buffer): DecodedMessage {
  if (buf.length < HEADER_SIZE) {
    throw new MalformedMessageError(
      `message is ${buf.length} octets, shorter than a header`
    );
  }

  try {
    const word = buf.readUInt16BE(2);
    const counts = [4, 6, 8, 10].map((at) => buf.readUInt16BE(at));
    let cursor = HEADER_SIZE;

    const questions: Question[] = [];
    for (let i = 0; i < (counts[0] ?? 0); i++) {
      const { name, next } = readName(buf, cursor);
      questions.push({
        name,
        type: buf.readUInt16BE(next),
        class: buf.readUInt16BE(next + 2),
      });
      cursor = next + 4;
    }

    let tsigOffset: number | undefined;
    const sections = counts.slice(1).map((count, index) => {
      const records: WireRecord[] = [];
      for (let i = 0; i < count; i++) {
        const start = cursor;
        const { record, next } = readRecord(buf, cursor);
        records.push(record);
        cursor = next;
        if (index === 2 && i === count - 1 && record.type === RECORD_TYPES.TSIG) {
          tsigOffset = start;
        }
      }
      return records;
    });

    return {
      id: buf.readUInt16BE(0),
      flags: word & FLAGS_MASK,
      opcode: (word >> 11) & 0xf,
      rcode: word & 0xf,
      questions,
      answers: sections[0] ?? [],
      authorities: sections[1] ?? [],
      additionals: sections[2] ?? [],
      tsigOffset,
    };
  } catch (err) {
    if (err instanceof MalformedMessageError) throw err;
    throw new MalformedMessageError('message is truncated', { cause: err });
  }
}
