import type { DnsRecord } from './provider.js';

/** Base class for every failure the RFC2136 client reports */
export class Rfc2136Error extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The record type mnemonic is outside the set the translator can encode */
export class UnsupportedRecordTypeError extends Rfc2136Error {
  readonly recordType: string;

  constructor(recordType: string) {
    super(`unsupported record type ${recordType}`);
    this.recordType = recordType;
  }
}

/** The record value cannot be encoded for its type */
export class InvalidRecordValueError extends Rfc2136Error {
  readonly recordType: string;
  readonly value: string;

  constructor(recordType: string, value: string, reason: string) {
    super(`invalid ${recordType} value "${value}": ${reason}`);
    this.recordType = recordType;
    this.value = value;
  }
}

/** Timeout, refused connection, unreachable host, unusable address */
export class NetworkError extends Rfc2136Error {
  readonly nameserver: string;

  constructor(nameserver: string, message: string, options?: ErrorOptions) {
    super(`${nameserver}: ${message}`, options);
    this.nameserver = nameserver;
  }
}

/** The server answered with a non-success response code */
export class ServerRejectedError extends Rfc2136Error {
  readonly rcode: number;
  readonly rcodeName: string;
  /** TSIG error name when the server refused the signature */
  readonly tsigError?: string;

  constructor(rcode: number, rcodeName: string, tsigError?: string) {
    super(
      tsigError
        ? `server replied ${rcodeName} (${tsigError})`
        : `server replied ${rcodeName}`
    );
    this.rcode = rcode;
    this.rcodeName = rcodeName;
    this.tsigError = tsigError;
  }
}

/** The reply's transaction signature is missing, stale or does not match */
export class TsigError extends Rfc2136Error {}

/** The bytes received cannot be decoded as a DNS message */
export class MalformedMessageError extends Rfc2136Error {}

export type UpdateOperation = 'append' | 'delete' | 'set';

/**
 * An update operation stopped at `record`.
 *
 * `applied` lists the records that reached the server before the failure;
 * `cause` is the underlying error.
 */
export class RecordUpdateError extends Rfc2136Error {
  readonly operation: UpdateOperation;
  readonly record: DnsRecord;
  readonly applied: DnsRecord[];

  constructor(
    operation: UpdateOperation,
    record: DnsRecord,
    applied: DnsRecord[],
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `failed to ${operation} ${record.type} record ${record.name}: ${reason}`,
      { cause }
    );
    this.operation = operation;
    this.record = record;
    this.applied = applied;
  }
}
