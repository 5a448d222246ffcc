import { createHmac, timingSafeEqual } from 'node:crypto';
import {
  CLASS_ANY,
  DEFAULT_TSIG_ALGORITHM,
  RECORD_TYPES,
  TSIG_ALGORITHMS,
  TSIG_FUDGE,
} from './constants.js';
import { fqdn } from './domain.js';
import { TsigError } from './errors.js';
import type { DecodedMessage, TsigRdata } from './types.js';
import { encodeName, encodeRecord } from './wire.js';

/** A shared-secret key in canonical form */
export interface TsigKey {
  /** Key name, fully qualified and lowercase */
  name: string;
  /** Algorithm name, fully qualified and lowercase */
  algorithm: string;
  /** HMAC digest backing the algorithm */
  digest: string;
  secret: Buffer;
  fudge: number;
}

export interface TsigKeyOptions {
  name: string;
  /** Base64-encoded secret */
  secret: string;
  /** Defaults to `hmac-sha256`; the trailing dot is optional */
  algorithm?: string;
}

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

function canonicalAlgorithm(algorithm: string | undefined): string {
  if (!algorithm?.trim()) return DEFAULT_TSIG_ALGORITHM;
  const name = fqdn(algorithm).toLowerCase();
  return name === 'hmac-md5.' ? 'hmac-md5.sig-alg.reg.int.' : name;
}

export function createTsigKey(options: TsigKeyOptions): TsigKey {
  const algorithm = canonicalAlgorithm(options.algorithm);
  const digest = TSIG_ALGORITHMS[algorithm];
  if (!digest) {
    throw new Error(`RFC2136: unsupported TSIG algorithm "${options.algorithm}"`);
  }

  const encoded = options.secret.replace(/\s+/g, '');
  if (!BASE64.test(encoded)) {
    throw new Error('RFC2136: tsigSecret must be base64-encoded');
  }

  return {
    name: fqdn(options.name).toLowerCase(),
    algorithm,
    digest,
    secret: Buffer.from(encoded, 'base64'),
    fudge: TSIG_FUDGE,
  };
}

/** TSIG variables covered by the MAC (RFC 8945 §4.3.3) */
function variables(
  key: TsigKey,
  timeSigned: number,
  fudge: number,
  error: number,
  other: Buffer
): Buffer {
  const fixed = Buffer.alloc(10);
  fixed.writeUIntBE(timeSigned, 0, 6);
  fixed.writeUInt16BE(fudge, 6);
  fixed.writeUInt16BE(error, 8);
  const otherLength = Buffer.alloc(2);
  otherLength.writeUInt16BE(other.length);

  const classAndTtl = Buffer.alloc(6);
  classAndTtl.writeUInt16BE(CLASS_ANY, 0);

  return Buffer.concat([
    encodeName(key.name),
    classAndTtl,
    encodeName(key.algorithm),
    fixed,
    otherLength,
    other,
  ]);
}

function computeMac(key: TsigKey, parts: Buffer[]): Buffer {
  const hmac = createHmac(key.digest, key.secret);
  for (const part of parts) hmac.update(part);
  return hmac.digest();
}

function macPrefix(requestMac: Buffer | undefined): Buffer[] {
  if (!requestMac) return [];
  const size = Buffer.alloc(2);
  size.writeUInt16BE(requestMac.length);
  return [size, requestMac];
}

export interface SignOptions {
  /** Seconds since the epoch */
  time: number;
  /** MAC of the request, when signing a reply */
  requestMac?: Buffer;
  /** TSIG error code to report, for replies */
  error?: number;
}

export interface SignedMessage {
  wire: Buffer;
  mac: Buffer;
}

/** Append a TSIG record to an encoded message and bump ARCOUNT */
export function signMessage(
  message: Buffer,
  key: TsigKey,
  options: SignOptions
): SignedMessage {
  const error = options.error ?? 0;
  const other = Buffer.alloc(0);
  const mac = computeMac(key, [
    ...macPrefix(options.requestMac),
    message,
    variables(key, options.time, key.fudge, error, other),
  ]);

  const tsig = encodeRecord({
    name: key.name,
    type: RECORD_TYPES.TSIG,
    class: CLASS_ANY,
    ttl: 0,
    rdata: {
      type: 'TSIG',
      algorithm: key.algorithm,
      timeSigned: options.time,
      fudge: key.fudge,
      mac,
      originalId: message.readUInt16BE(0),
      error,
      other,
    },
  });

  const wire = Buffer.concat([message, tsig]);
  wire.writeUInt16BE(message.readUInt16BE(10) + 1, 10);
  return { wire, mac };
}

export interface VerifyOptions {
  /** Seconds since the epoch */
  now: number;
  /** MAC of the request this message answers */
  requestMac?: Buffer;
}

/**
 * Check the TSIG record at the end of a decoded message.
 *
 * Returns undefined for unsigned messages. A record whose error field is set
 * is returned without checking its MAC, which servers leave empty when they
 * reject a signature.
 */
export function verifyMessage(
  wire: Buffer,
  message: DecodedMessage,
  key: TsigKey,
  options: VerifyOptions
): TsigRdata | undefined {
  if (message.tsigOffset === undefined) return undefined;

  const record = message.additionals[message.additionals.length - 1];
  const rdata = record?.rdata;
  if (!record || rdata?.type !== 'TSIG') {
    throw new TsigError('TSIG record has no data');
  }
  if (fqdn(record.name).toLowerCase() !== key.name) {
    throw new TsigError(`signed with unknown key ${record.name}`);
  }
  if (fqdn(rdata.algorithm).toLowerCase() !== key.algorithm) {
    throw new TsigError(`signed with unexpected algorithm ${rdata.algorithm}`);
  }
  if (rdata.error !== 0) return rdata;

  const unsigned = Buffer.from(wire.subarray(0, message.tsigOffset));
  unsigned.writeUInt16BE(rdata.originalId, 0);
  unsigned.writeUInt16BE(message.additionals.length - 1, 10);

  const expected = computeMac(key, [
    ...macPrefix(options.requestMac),
    unsigned,
    variables(key, rdata.timeSigned, rdata.fudge, rdata.error, rdata.other),
  ]);
  if (
    expected.length !== rdata.mac.length ||
    !timingSafeEqual(expected, rdata.mac)
  ) {
    throw new TsigError('signature does not match');
  }
  if (Math.abs(options.now - rdata.timeSigned) > rdata.fudge) {
    throw new TsigError(
      `signature time ${rdata.timeSigned} is outside the ${rdata.fudge}s fudge window`
    );
  }
  return rdata;
}
