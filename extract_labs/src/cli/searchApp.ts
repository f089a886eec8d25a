import * as readline from 'node:readline/promises';
import { loadSearchConfig } from '@/config/env';
import { describeError } from '@/output/log';
import { AzureDocumentSearcher } from '@/search/searchDocuments';
import { runSearchLoop } from '@/search/searchLoop';

async function main() {
  console.clear();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const config = loadSearchConfig();
    const searcher = new AzureDocumentSearcher(config);

    await runSearchLoop(searcher, (question) => rl.question(question));
  } catch (e) {
    console.error(describeError(e));
  } finally {
    rl.close();
  }
}

main().catch(console.error);
