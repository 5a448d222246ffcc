import { randomInt } from 'node:crypto';
import { createClient } from '../client.js';
import type { Rfc2136Config } from '../config.js';
import { DEFAULT_TIMEOUT_MS } from '../constants.js';
import { isNormalizable, normalizeNameserver } from '../domain.js';
import { RecordUpdateError } from '../errors.js';
import type { UpdateOperation } from '../errors.js';
import { createMutex } from '../lock.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { DnsProvider, DnsRecord, OperationOptions } from '../provider.js';
import { buildZoneQuery, recordsFromReply } from '../query.js';
import type { OwnerNameMode } from '../records.js';
import { buildTransaction, encodeTransaction } from '../transaction.js';
import { createTransport } from '../transport.js';
import type { Protocol, Transport } from '../transport.js';
import { createTsigKey } from '../tsig.js';
import { checkName } from '../wire.js';

export interface Rfc2136Options extends Rfc2136Config {
  /** Defaults to `udp` */
  protocol?: Protocol;
  /** Milliseconds to wait for each reply; defaults to 2000 */
  timeout?: number;
  /**
   * Owner name written into each record's header. Defaults to `zone`, which
   * places every record at the zone name passed to the operation; `record`
   * uses the record's own name, resolved against the zone.
   */
  ownerName?: OwnerNameMode;
  logger?: Logger;
  /** Replaces the UDP/TCP transport, e.g. with an in-process server */
  transport?: Transport;
  /** Milliseconds since the epoch, used for TSIG timestamps */
  clock?: () => number;
}

function nextMessageId(): number {
  return randomInt(0x10000);
}

/**
 * Create an RFC 2136 dynamic update provider.
 *
 * Every operation holds a provider-wide lock for its whole duration, so wire
 * exchanges never interleave. Updates are sent as one transaction per
 * record; the first failure stops the batch with a {@link RecordUpdateError}
 * listing the records already applied.
 */
export function rfc2136(options: Rfc2136Options): DnsProvider {
  if (!options.nameserver?.trim()) {
    throw new Error('RFC2136: nameserver is required');
  }
  if (
    options.timeout !== undefined &&
    !(Number.isFinite(options.timeout) && options.timeout > 0)
  ) {
    throw new Error('RFC2136: timeout must be a positive number of milliseconds');
  }

  const address = options.nameserver.trim();
  const ownerName = options.ownerName ?? 'zone';
  const logger = (options.logger ?? createLogger('rfc2136')).child({
    nameserver: address,
  });

  const keyName = options.tsigKeyName?.trim() ?? '';
  const secret = options.tsigSecret?.trim() ?? '';
  const tsigKey =
    keyName && secret
      ? createTsigKey({
          name: keyName,
          secret,
          algorithm: options.tsigAlgorithm,
        })
      : undefined;
  if (!tsigKey && (keyName || secret)) {
    logger.warn('TSIG needs both a key name and a secret; requests will be unsigned');
  }

  const transport =
    options.transport ??
    createTransport({
      protocol: options.protocol,
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
    });
  const client = createClient({
    transport,
    tsigKey,
    logger,
    clock: options.clock,
  });
  const mutex = createMutex();

  function nameserver(): string {
    const normalized = normalizeNameserver(address);
    if (!isNormalizable(address)) {
      logger.warn('nameserver address is malformed; passing it through unchanged');
    }
    return normalized;
  }

  function assertZone(zone: string): void {
    const problem = checkName(zone);
    if (problem) throw new Error(`RFC2136: invalid zone "${zone}": ${problem}`);
  }

  async function update(
    operation: UpdateOperation,
    zone: string,
    records: DnsRecord[],
    { signal }: OperationOptions = {}
  ): Promise<DnsRecord[]> {
    assertZone(zone);

    return mutex.runExclusive(async () => {
      const server = nameserver();
      const applied: DnsRecord[] = [];

      for (const record of records) {
        try {
          const tx = buildTransaction(zone, record, operation, { ownerName });
          await client.exchange(encodeTransaction(tx, nextMessageId()), server, {
            signal,
          });
        } catch (err) {
          throw new RecordUpdateError(operation, record, [...applied], err);
        }
        applied.push(record);
        logger.debug('record updated', {
          operation,
          zone,
          name: record.name,
          type: record.type,
        });
      }

      return applied;
    }, signal);
  }

  return {
    async getRecords(
      zone: string,
      { signal }: OperationOptions = {}
    ): Promise<DnsRecord[]> {
      assertZone(zone);

      return mutex.runExclusive(async () => {
        const reply = await client.exchange(
          buildZoneQuery(zone, nextMessageId()),
          nameserver(),
          { signal }
        );
        return recordsFromReply(reply);
      }, signal);
    },

    appendRecords(zone, records, operationOptions) {
      return update('append', zone, records, operationOptions);
    },

    setRecords(zone, records, operationOptions) {
      return update('set', zone, records, operationOptions);
    },

    deleteRecords(zone, records, operationOptions) {
      return update('delete', zone, records, operationOptions);
    },
  };
}
