/** Default DNS port appended to nameserver addresses without one */
export const DEFAULT_DNS_PORT = '53';

/** Default time to wait for a reply, in milliseconds */
export const DEFAULT_TIMEOUT_MS = 2000;

/** Permitted clock skew for TSIG timestamps, in seconds */
export const TSIG_FUDGE = 300;

/** TSIG algorithm used when a key is configured without one */
export const DEFAULT_TSIG_ALGORITHM = 'hmac-sha256.';

/** MX preference used when the record value carries only an exchange host */
export const DEFAULT_MX_PREFERENCE = 0;

/** Largest single character-string in TXT RDATA */
export const MAX_TXT_CHUNK = 255;

/** Largest RDATA a resource record can carry */
export const MAX_RDATA_LENGTH = 0xffff;

export const OPCODE_QUERY = 0;
export const OPCODE_UPDATE = 5;

export const FLAG_QR = 0x8000;
export const FLAG_TC = 0x0200;
export const FLAG_RD = 0x0100;

export const CLASS_IN = 1;
export const CLASS_NONE = 254;
export const CLASS_ANY = 255;

export const RECORD_TYPES = {
  A: 1,
  NS: 2,
  CNAME: 5,
  SOA: 6,
  PTR: 12,
  MX: 15,
  TXT: 16,
  AAAA: 28,
  SRV: 33,
  OPT: 41,
  TSIG: 250,
  ANY: 255,
} as const;

/** Types that can be written through the provider */
export const SUPPORTED_RECORD_TYPES = ['A', 'AAAA', 'CNAME', 'MX', 'TXT'] as const;

export type SupportedRecordType = (typeof SUPPORTED_RECORD_TYPES)[number];

export const RCODE_NAMES: Record<number, string> = {
  0: 'NOERROR',
  1: 'FORMERR',
  2: 'SERVFAIL',
  3: 'NXDOMAIN',
  4: 'NOTIMP',
  5: 'REFUSED',
  6: 'YXDOMAIN',
  7: 'YXRRSET',
  8: 'NXRRSET',
  9: 'NOTAUTH',
  10: 'NOTZONE',
  16: 'BADSIG',
  17: 'BADKEY',
  18: 'BADTIME',
  22: 'BADTRUNC',
};

/** TSIG algorithm names (canonical, fully qualified) mapped to HMAC digests */
export const TSIG_ALGORITHMS: Record<string, string> = {
  'hmac-md5.sig-alg.reg.int.': 'md5',
  'hmac-sha1.': 'sha1',
  'hmac-sha224.': 'sha224',
  'hmac-sha256.': 'sha256',
  'hmac-sha384.': 'sha384',
  'hmac-sha512.': 'sha512',
};
