import type { Log } from '@/output/log';
import { formatSearchResults, type DocumentSearcher } from './searchDocuments';

export const QUERY_PROMPT = "Enter a query (or type 'quit' to exit): ";

export type Prompt = (question: string) => Promise<string>;

export type SearchLoopOptions = {
  log?: Log;
  clear?: () => void;
};

/**
 * Prompt for queries until the user types "quit". Returns how many
 * searches were run.
 */
export async function runSearchLoop(
  searcher: DocumentSearcher,
  prompt: Prompt,
  options: SearchLoopOptions = {},
): Promise<number> {
  const log = options.log ?? console.log;
  const clear = options.clear ?? (() => console.clear());
  let searches = 0;

  for (;;) {
    const queryText = (await prompt(QUERY_PROMPT)).trim();

    if (queryText.toLowerCase() === 'quit') break;

    if (queryText.length === 0) {
      log('Please enter a query.');
      continue;
    }

    clear();
    const page = await searcher.search(queryText);
    searches += 1;
    for (const line of formatSearchResults(page)) log(line);
  }

  return searches;
}
