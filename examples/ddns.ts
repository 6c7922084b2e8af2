/**
 * Live run: point an address record at this machine's public IP.
 *
 * Usage:
 *   PORKBUN_API_KEY=pk1_xxx PORKBUN_SECRET_API_KEY=sk1_xxx npx tsx examples/ddns.ts example.com [subdomain]
 */

import { createDnsClient, createTransport } from '../src/index.js';

const domain = process.argv[2];
const subdomain = process.argv[3];
const apiKey = process.env.PORKBUN_API_KEY;
const secretApiKey = process.env.PORKBUN_SECRET_API_KEY;

if (!domain) {
  console.error('Usage: npx tsx examples/ddns.ts <domain> [subdomain]');
  process.exit(1);
}

if (!apiKey || !secretApiKey) {
  console.error('Missing PORKBUN_API_KEY or PORKBUN_SECRET_API_KEY environment variable.');
  console.error('Create keys at: https://porkbun.com/account/api');
  console.error('API access must also be enabled for the domain itself.');
  process.exit(1);
}

async function main(key: string, secret: string, root: string) {
  const client = createDnsClient(
    createTransport({
      apiKey: key,
      secretApiKey: secret,
      endpoint: 'https://api-ipv4.porkbun.com/api/json/v3',
    })
  );

  console.log('\nAsking Porkbun for our public IP...');
  const ip = await client.resolvePublicIp();
  console.log(`  ${ip.address}`);

  console.log(`\nUpdating ${subdomain ? `${subdomain}.` : ''}${root}...`);
  const result = await client.upsertAddressRecord(root, ip, subdomain);

  for (const r of result.deleted) {
    console.log(`  - Deleted: ${r.type} ${r.name} (${r.content})`);
  }
  console.log(`  + Created: ${ip.version === 4 ? 'A' : 'AAAA'} -> ${ip.exploded} (${result.created.status})`);
}

main(apiKey, secretApiKey, domain).catch((err) => {
  console.error('\nError:', err.message);
  process.exit(1);
});
