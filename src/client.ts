import { NetworkError, ServerRejectedError, TsigError } from './errors.js';
import type { Logger } from './logger.js';
import type { ExchangeOptions, Transport } from './transport.js';
import { signMessage, verifyMessage } from './tsig.js';
import type { TsigKey } from './tsig.js';
import type { DecodedMessage } from './types.js';
import { decodeMessage, rcodeToString } from './wire.js';

export interface ClientOptions {
  transport: Transport;
  /** Signs every request and verifies every reply when set */
  tsigKey?: TsigKey;
  logger: Logger;
  /** Milliseconds since the epoch */
  clock?: () => number;
}

export interface DnsClient {
  /**
   * Sign, send and classify one message.
   *
   * Rejects with {@link NetworkError} when no usable reply arrives,
   * {@link TsigError} when the reply's signature cannot be trusted and
   * {@link ServerRejectedError} when its response code is not NOERROR.
   */
  exchange(
    message: Buffer,
    nameserver: string,
    options?: ExchangeOptions
  ): Promise<DecodedMessage>;
}

export function createClient(options: ClientOptions): DnsClient {
  const { transport, tsigKey, logger } = options;
  const clock = options.clock ?? Date.now;
  const seconds = () => Math.floor(clock() / 1000);

  return {
    async exchange(message, nameserver, exchangeOptions = {}) {
      const id = message.readUInt16BE(0);
      const signed = tsigKey
        ? signMessage(message, tsigKey, { time: seconds() })
        : undefined;

      logger.debug('exchanging message', {
        nameserver,
        id,
        opcode: (message.readUInt16BE(2) >> 11) & 0xf,
        signed: signed !== undefined,
      });

      const wire = await transport.exchange(
        signed?.wire ?? message,
        nameserver,
        exchangeOptions
      );
      const reply = decodeMessage(wire);
      if (reply.id !== id) {
        throw new NetworkError(
          nameserver,
          `reply id ${reply.id} does not match request id ${id}`
        );
      }

      if (tsigKey && signed) {
        const tsig = verifyMessage(wire, reply, tsigKey, {
          now: seconds(),
          requestMac: signed.mac,
        });
        if (tsig && tsig.error !== 0) {
          throw new ServerRejectedError(
            reply.rcode,
            rcodeToString(reply.rcode),
            rcodeToString(tsig.error)
          );
        }
        if (!tsig && reply.rcode === 0) {
          throw new TsigError('reply to a signed request is not signed');
        }
      }

      if (reply.rcode !== 0) {
        throw new ServerRejectedError(reply.rcode, rcodeToString(reply.rcode));
      }
      return reply;
    },
  };
}
