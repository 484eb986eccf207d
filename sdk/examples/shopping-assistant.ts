/**
 * Shopping Assistant Example
 *
 * Runs the three chains against a product database and an FAQ file:
 * - chitchat: small talk with the current date and time
 * - faq: answers grounded in the ingested FAQ records
 * - sql: natural-language product search over the `product` table
 *
 * Prerequisites:
 * 1. Add OPENAI_API_KEY to .env
 * 2. Point SHOPCHAIN_PRODUCT_DB at a SQLite file with a `product` table
 *
 * Run: npx tsx sdk/examples/shopping-assistant.ts
 */

import { fileURLToPath } from 'node:url';
import { clientConfigFromSettings, createClient, loadSettings } from '../src';
import type { ChainKind } from '../src';

const FAQ_PATH = fileURLToPath(new URL('./data/faqs.csv', import.meta.url));

const QUERIES: Array<[ChainKind, string]> = [
  ['chitchat', 'Hi there! What day is it today?'],
  ['faq', 'Do you take cash as a payment option?'],
  ['faq', 'What can I do about a defective item?'],
  ['sql', 'Show top 3 shoes in descending order of rating'],
  ['sql', 'Puma shoes with more than 30% discount'],
];

async function main() {
  const settings = loadSettings();
  const client = createClient(clientConfigFromSettings(settings));

  try {
    const ingest = await client.ingestFaqs(FAQ_PATH);
    console.log(
      ingest.skipped
        ? `FAQ collection "${ingest.collection}" already loaded`
        : `Loaded ${ingest.indexed} FAQs into "${ingest.collection}"`
    );

    for (const [kind, input] of QUERIES) {
      const result = await client.run(kind, input);

      console.log(`\n[${kind}] ${input}`);
      if (result.ok) {
        console.log(result.text);
      } else {
        console.log(`${result.text} (${result.kind} error)`);
      }
    }
  } finally {
    await client.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
