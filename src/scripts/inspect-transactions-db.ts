import { isFullDatabase } from '@notionhq/client';
import { assertConfig, config } from '../config';
import { createNotionClient } from '../notion';
import { checkTransactionsSchema, describeProperties } from '../schema';

async function main() {
  assertConfig();
  const notion = createNotionClient(config);
  const db = await notion.databases.retrieve({ database_id: config.transactionsDbId });
  if (!isFullDatabase(db)) {
    console.error('[inspect] the integration cannot read this database; share it with the integration first');
    process.exit(1);
  }
  console.log(`[inspect] ${db.title.map((t) => t.plain_text).join('')}`);
  console.log(`id: ${db.id}`);
  console.log('properties:');
  console.log(describeProperties(db.properties));

  const problems = checkTransactionsSchema(db.properties, config.transactionProps);
  if (!problems.length) {
    console.log('\nSchema looks good.');
    return;
  }
  console.log('\nProblems:');
  for (const p of problems) console.log(`- ${p}`);
  console.log('\nRename the properties in Notion or set TX_PROP_* in .env');
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
