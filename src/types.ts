/** Type-specific record data, keyed by mnemonic */
export type Rdata =
  | { type: 'A'; address: string }
  | { type: 'AAAA'; address: string }
  | { type: 'CNAME' | 'NS' | 'PTR'; target: string }
  | { type: 'MX'; preference: number; exchange: string }
  | { type: 'TXT'; text: string[] }
  | {
      type: 'SOA';
      mname: string;
      rname: string;
      serial: number;
      refresh: number;
      retry: number;
      expire: number;
      minimum: number;
    }
  | { type: 'SRV'; priority: number; weight: number; port: number; target: string }
  | {
      type: 'TSIG';
      algorithm: string;
      /** Seconds since the epoch (48-bit on the wire) */
      timeSigned: number;
      fudge: number;
      mac: Buffer;
      originalId: number;
      error: number;
      other: Buffer;
    }
  | { type: 'UNKNOWN'; data: Buffer };

/** A resource record as it travels on the wire */
export interface WireRecord {
  name: string;
  /** Numeric RR type */
  type: number;
  class: number;
  /** Seconds, unsigned 32-bit */
  ttl: number;
  /** Absent on directives that carry empty RDATA (RRset deletion) */
  rdata?: Rdata;
}

export interface Question {
  name: string;
  type: number;
  class: number;
}

export interface Message {
  id: number;
  /** Header flags word without the opcode and rcode bits */
  flags: number;
  opcode: number;
  rcode: number;
  /** Question section (the zone section in an UPDATE) */
  questions: Question[];
  /** Answer section (prerequisites in an UPDATE) */
  answers: WireRecord[];
  /** Authority section (updates in an UPDATE) */
  authorities: WireRecord[];
  additionals: WireRecord[];
}

/** A decoded message plus where its trailing TSIG record starts, if any */
export interface DecodedMessage extends Message {
  tsigOffset?: number;
}

/** Removal directives of an update transaction */
export type Removal =
  /** Delete every record of `type` at `name` */
  | { kind: 'rrset'; name: string; type: number }
  /** Delete the single record matching name, type and value */
  | { kind: 'record'; record: WireRecord };

export interface UpdateTransaction {
  /** Fully qualified zone name */
  zone: string;
  removals: Removal[];
  insertions: WireRecord[];
}

export type TsigRdata = Extract<Rdata, { type: 'TSIG' }>;
