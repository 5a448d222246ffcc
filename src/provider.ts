/** A DNS record in provider-neutral form */
export interface DnsRecord {
  /** Owner name, absolute (`www.example.org.`) or relative to the zone (`www`) */
  name: string;
  /** Type mnemonic, e.g. `A` or `TXT` */
  type: string;
  /** Record data in its textual presentation form */
  value: string;
  /** Time to live in seconds */
  ttl: number;
}

export interface OperationOptions {
  /** Aborts the operation, including a wire exchange already in flight */
  signal?: AbortSignal;
}

export interface RecordGetter {
  /** List all records in the zone */
  getRecords(zone: string, options?: OperationOptions): Promise<DnsRecord[]>;
}

export interface RecordAppender {
  /** Add records without touching existing data; returns the records added */
  appendRecords(
    zone: string,
    records: DnsRecord[],
    options?: OperationOptions
  ): Promise<DnsRecord[]>;
}

export interface RecordSetter {
  /** Replace each record's RRset with the given value; returns the records set */
  setRecords(
    zone: string,
    records: DnsRecord[],
    options?: OperationOptions
  ): Promise<DnsRecord[]>;
}

export interface RecordDeleter {
  /** Delete records by exact value; returns the records deleted */
  deleteRecords(
    zone: string,
    records: DnsRecord[],
    options?: OperationOptions
  ): Promise<DnsRecord[]>;
}

/** Full interface for a DNS provider adapter */
export interface DnsProvider
  extends RecordGetter,
    RecordAppender,
    RecordSetter,
    RecordDeleter {}
