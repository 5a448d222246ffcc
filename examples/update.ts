/**
 * Live test: set, list and remove a TXT record through dynamic update.
 *
 * Usage:
 *   RFC2136_NAMESERVER=192.0.2.53 RFC2136_TSIG_KEYNAME=update-key \
 *   RFC2136_TSIG_SECRET=base64== npx tsx examples/update.ts example.org "hello"
 */

import { rfc2136 } from '../src/index.js';

const zone = process.argv[2];
const value = process.argv[3] ?? `dynamic update test ${new Date().toISOString()}`;
const nameserver = process.env.RFC2136_NAMESERVER;

if (!zone) {
  console.error(
    'Usage: RFC2136_NAMESERVER=host[:port] npx tsx examples/update.ts <zone> [value]'
  );
  process.exit(1);
}

if (!nameserver) {
  console.error('Missing RFC2136_NAMESERVER environment variable.');
  console.error('Optionally set RFC2136_TSIG_KEYNAME, RFC2136_TSIG_SECRET and');
  console.error('RFC2136_TSIG_ALGORITHM to sign requests.');
  process.exit(1);
}

async function main(zone: string, nameserver: string) {
  const provider = rfc2136({
    nameserver,
    tsigKeyName: process.env.RFC2136_TSIG_KEYNAME,
    tsigSecret: process.env.RFC2136_TSIG_SECRET,
    tsigAlgorithm: process.env.RFC2136_TSIG_ALGORITHM,
  });
  const record = { name: '@', type: 'TXT', value, ttl: 300 };

  console.log(`\nSetting TXT on ${zone} via ${nameserver}...`);
  await provider.setRecords(zone, [record]);
  console.log(`  + Set: TXT ${zone} -> ${value}`);

  console.log(`\nRecords at ${zone}:`);
  for (const r of await provider.getRecords(zone)) {
    console.log(`  ${r.type.padEnd(6)} ${r.ttl.toString().padStart(6)} ${r.value}`);
  }

  console.log(`\nRemoving the test record...`);
  await provider.deleteRecords(zone, [record]);
  console.log(`  - Deleted: TXT ${zone} (${value})`);
}

main(zone, nameserver).catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
