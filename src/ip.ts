import { isIPv4, isIPv6 } from 'node:net';

export function ipv4ToBytes(address: string): Buffer {
  if (!isIPv4(address)) {
    throw new TypeError(`not an IPv4 address: ${address}`);
  }
  return Buffer.from(address.split('.').map((octet) => Number(octet)));
}

export function bytesToIPv4(bytes: Uint8Array): string {
  return Array.from(bytes.subarray(0, 4)).join('.');
}

/** Parse an IPv6 literal (including `::` and a dotted IPv4 tail) into 16 bytes */
export function ipv6ToBytes(address: string): Buffer {
  if (!isIPv6(address)) {
    throw new TypeError(`not an IPv6 address: ${address}`);
  }

  let text = address;
  const zone = text.indexOf('%');
  if (zone >= 0) text = text.slice(0, zone);

  // Rewrite a dotted IPv4 tail as two hex groups
  const lastColon = text.lastIndexOf(':');
  const tail = text.slice(lastColon + 1);
  if (tail.includes('.')) {
    const v4 = ipv4ToBytes(tail);
    text =
      text.slice(0, lastColon + 1) +
      v4.readUInt16BE(0).toString(16) +
      ':' +
      v4.readUInt16BE(2).toString(16);
  }

  const [head, rest] = text.split('::');
  const headGroups = head ? head.split(':') : [];
  const restGroups = rest ? rest.split(':') : [];
  const missing = 8 - headGroups.length - restGroups.length;
  const groups =
    rest === undefined
      ? headGroups
      : [...headGroups, ...Array<string>(missing).fill('0'), ...restGroups];

  const bytes = Buffer.alloc(16);
  groups.forEach((group, i) => {
    bytes.writeUInt16BE(parseInt(group, 16), i * 2);
  });
  return bytes;
}

/** Format 16 bytes in RFC 5952 form: lowercase, longest zero run compressed */
export function bytesToIPv6(bytes: Uint8Array): string {
  const buf = Buffer.from(bytes.subarray(0, 16));
  const groups: number[] = [];
  for (let i = 0; i < 16; i += 2) {
    groups.push(buf.readUInt16BE(i));
  }

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = groups.map((g) => g.toString(16));
  if (bestLength < 2) return hex.join(':');

  const head = hex.slice(0, bestStart).join(':');
  const tail = hex.slice(bestStart + bestLength).join(':');
  return `${head}::${tail}`;
}
