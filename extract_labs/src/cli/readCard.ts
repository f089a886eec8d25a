import * as path from 'node:path';
import { loadContentUnderstandingConfig } from '@/config/env';
import { PATHS } from '@/config/paths';
import { analyzeCard } from '@/contentUnderstanding/analyzeCard';
import { ContentUnderstandingClient } from '@/contentUnderstanding/client';
import { describeError } from '@/output/log';

async function main() {
  console.clear();

  try {
    // 引数がなければサンプルの名刺画像
    const imageArg = process.argv[2];
    const imageFile = imageArg ? path.resolve(imageArg) : PATHS.DEFAULT_CARD;

    const config = loadContentUnderstandingConfig();
    const client = new ContentUnderstandingClient(config);

    await analyzeCard(client, config.analyzer, imageFile);

    console.log('\n');
  } catch (e) {
    console.error(describeError(e));
  }
}

main().catch(console.error);
