import { describe, it, expect, vi } from 'vitest';
import { createClient } from '../src/client.js';
import { CLASS_IN, FLAG_QR, OPCODE_UPDATE, RECORD_TYPES } from '../src/constants.js';
import {
  MalformedMessageError,
  NetworkError,
  ServerRejectedError,
  TsigError,
} from '../src/errors.js';
import type { Logger } from '../src/logger.js';
import { noopLogger } from '../src/logger.js';
import type { Transport } from '../src/transport.js';
import { createTsigKey, signMessage } from '../src/tsig.js';
import { decodeMessage, encodeMessage } from '../src/wire.js';

const nameserver = '192.0.2.53:53';
const now = 1_700_000_000;
const key = createTsigKey({
  name: 'update-key',
  secret: Buffer.from('test-secret').toString('base64'),
});

function message(id: number, flags = 0, rcode = 0): Buffer {
  return encodeMessage({
    id,
    flags,
    opcode: OPCODE_UPDATE,
    rcode,
    questions: [{ name: 'example.org.', type: RECORD_TYPES.SOA, class: CLASS_IN }],
    answers: [],
    authorities: [],
    additionals: [],
  });
}

function replying(reply: (request: Buffer) => Buffer): Transport {
  return { exchange: vi.fn(async (request: Buffer) => reply(request)) };
}

/** Reply signed over the request's MAC */
function signedReply(request: Buffer, time = now): Buffer {
  const tsig = decodeMessage(request).additionals[0]?.rdata;
  if (tsig?.type !== 'TSIG') throw new Error('request is not signed');
  return signMessage(message(request.readUInt16BE(0), FLAG_QR), key, {
    time,
    requestMac: tsig.mac,
  }).wire;
}

describe('createClient', () => {
  it('returns the decoded reply', async () => {
    const client = createClient({
      transport: replying(() => message(7, FLAG_QR)),
      logger: noopLogger,
    });

    const reply = await client.exchange(message(7), nameserver);
    expect(reply.id).toBe(7);
    expect(reply.flags).toBe(FLAG_QR);
  });

  it('rejects a reply with another ID', async () => {
    const client = createClient({
      transport: replying(() => message(2, FLAG_QR)),
      logger: noopLogger,
    });

    const err = await client.exchange(message(1), nameserver).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toHaveProperty(
      'message',
      '192.0.2.53:53: reply id 2 does not match request id 1'
    );
  });

  it('classifies error response codes', async () => {
    const client = createClient({
      transport: replying(() => message(1, FLAG_QR, 8)),
      logger: noopLogger,
    });

    const err = await client.exchange(message(1), nameserver).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ServerRejectedError);
    expect(err).toHaveProperty('rcodeName', 'NXRRSET');
  });

  it('rejects undecodable replies', async () => {
    const client = createClient({
      transport: replying(() => Buffer.alloc(3)),
      logger: noopLogger,
    });

    await expect(client.exchange(message(1), nameserver)).rejects.toThrow(
      MalformedMessageError
    );
  });

  it('signs with the clock and verifies the reply', async () => {
    const transport = replying((request) => signedReply(request));
    const client = createClient({
      transport,
      tsigKey: key,
      logger: noopLogger,
      clock: () => now * 1000 + 500,
    });

    await client.exchange(message(1), nameserver);

    const sent = vi.mocked(transport.exchange).mock.calls[0]?.[0];
    expect(sent && decodeMessage(sent).additionals[0]?.rdata).toMatchObject({
      type: 'TSIG',
      timeSigned: now,
      originalId: 1,
    });
  });

  it('rejects a reply signed outside the fudge window', async () => {
    const client = createClient({
      transport: replying((request) => signedReply(request, now - 400)),
      tsigKey: key,
      logger: noopLogger,
      clock: () => now * 1000,
    });

    await expect(client.exchange(message(1), nameserver)).rejects.toThrow(TsigError);
  });

  it('logs each exchange at debug level', async () => {
    const logger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: () => logger,
    };
    const client = createClient({
      transport: replying(() => message(9, FLAG_QR)),
      logger,
    });

    await client.exchange(message(9), nameserver);
    expect(logger.debug).toHaveBeenCalledWith('exchanging message', {
      nameserver,
      id: 9,
      opcode: OPCODE_UPDATE,
      signed: false,
    });
  });
});
