export { rfc2136 } from './providers/rfc2136.js';
export type { Rfc2136Options } from './providers/rfc2136.js';
export { parseRfc2136Config, serializeRfc2136Config } from './config.js';
export type { Rfc2136Config, Rfc2136ConfigJson } from './config.js';
export {
  fqdn,
  joinHostPort,
  normalizeNameserver,
  resolveOwnerName,
  splitHostPort,
} from './domain.js';
export { fromWire, presentRdata, toWire } from './records.js';
export type { OwnerNameMode, TranslateOptions } from './records.js';
export { buildTransaction, encodeTransaction } from './transaction.js';
export { buildZoneQuery, recordsFromReply } from './query.js';
export { createTsigKey, signMessage, verifyMessage } from './tsig.js';
export type { TsigKey, TsigKeyOptions } from './tsig.js';
export { createTransport } from './transport.js';
export type {
  ExchangeOptions,
  Protocol,
  Transport,
  TransportOptions,
} from './transport.js';
export { createClient } from './client.js';
export type { DnsClient } from './client.js';
export { decodeMessage, encodeMessage } from './wire.js';
export { createMutex } from './lock.js';
export type { Mutex } from './lock.js';
export { createLogger, noopLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export {
  Rfc2136Error,
  UnsupportedRecordTypeError,
  InvalidRecordValueError,
  NetworkError,
  ServerRejectedError,
  TsigError,
  MalformedMessageError,
  RecordUpdateError,
} from './errors.js';
export type { UpdateOperation } from './errors.js';
export {
  DEFAULT_DNS_PORT,
  DEFAULT_TIMEOUT_MS,
  SUPPORTED_RECORD_TYPES,
  TSIG_FUDGE,
} from './constants.js';
export type {
  DnsProvider,
  DnsRecord,
  OperationOptions,
  RecordAppender,
  RecordDeleter,
  RecordGetter,
  RecordSetter,
} from './provider.js';
export type {
  DecodedMessage,
  Message,
  Question,
  Rdata,
  Removal,
  UpdateTransaction,
  WireRecord,
} from './types.js';
