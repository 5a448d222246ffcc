/** Connection settings shared by the provider and its JSON form */
export interface Rfc2136Config {
  /** Nameserver address, `host` or `host:port` */
  nameserver: string;
  /** TSIG algorithm, e.g. `hmac-sha256`; the trailing dot is optional */
  tsigAlgorithm?: string;
  tsigKeyName?: string;
  /** Base64-encoded shared secret */
  tsigSecret?: string;
}

/** On-disk JSON shape of {@link Rfc2136Config} */
export interface Rfc2136ConfigJson {
  nameserver?: string;
  tsig_algorithm?: string;
  tsig_keyname?: string;
  tsig_secret?: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(
  source: Record<string, unknown>,
  key: keyof Rfc2136ConfigJson
): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`RFC2136: ${key} must be a string`);
  }
  return value;
}

/**
 * Parse the JSON configuration shape.
 *
 * ```json
 * { "nameserver": "ns.example.org:53", "tsig_keyname": "update",
 *   "tsig_algorithm": "hmac-sha256", "tsig_secret": "c2VjcmV0" }
 * ```
 */
export function parseRfc2136Config(input: unknown): Rfc2136Config {
  if (!isObject(input)) {
    throw new Error('RFC2136: configuration must be a JSON object');
  }

  const nameserver = optionalString(input, 'nameserver');
  if (!nameserver?.trim()) {
    throw new Error('RFC2136: nameserver is required');
  }

  const config: Rfc2136Config = { nameserver };
  const tsigAlgorithm = optionalString(input, 'tsig_algorithm');
  const tsigKeyName = optionalString(input, 'tsig_keyname');
  const tsigSecret = optionalString(input, 'tsig_secret');
  if (tsigAlgorithm) config.tsigAlgorithm = tsigAlgorithm;
  if (tsigKeyName) config.tsigKeyName = tsigKeyName;
  if (tsigSecret) config.tsigSecret = tsigSecret;
  return config;
}

/** Inverse of {@link parseRfc2136Config}; empty fields are omitted */
export function serializeRfc2136Config(config: Rfc2136Config): Rfc2136ConfigJson {
  const json: Rfc2136ConfigJson = { nameserver: config.nameserver };
  if (config.tsigAlgorithm) json.tsig_algorithm = config.tsigAlgorithm;
  if (config.tsigKeyName) json.tsig_keyname = config.tsigKeyName;
  if (config.tsigSecret) json.tsig_secret = config.tsigSecret;
  return json;
}
