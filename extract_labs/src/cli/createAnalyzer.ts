import * as fs from 'node:fs';
import { loadContentUnderstandingConfig } from '@/config/env';
import { PATHS } from '@/config/paths';
import { ContentUnderstandingClient } from '@/contentUnderstanding/client';
import { createAnalyzer } from '@/contentUnderstanding/createAnalyzer';
import { describeError } from '@/output/log';

async function main() {
  console.clear();

  try {
    // Get the business card schema
    const schema = await fs.promises.readFile(PATHS.ANALYZER_SCHEMA, 'utf8');
    const schemaJson = JSON.stringify(JSON.parse(schema));

    const config = loadContentUnderstandingConfig();
    const client = new ContentUnderstandingClient(config);

    await createAnalyzer(client, config.analyzer, schemaJson);

    console.log('\n');
  } catch (e) {
    console.error(describeError(e));
  }
}

main().catch(console.error);
