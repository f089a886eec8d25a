import * as fs from 'node:fs';
import { PATHS } from '@/config/paths';
import { isSucceeded, pollUntilTerminal, type PollOptions } from '@/polling/pollUntilTerminal';
import type { Log } from '@/output/log';
import { saveJson } from '@/output/save';
import {
  ContentUnderstandingError,
  type AnalyzeResultResponse,
  type ContentUnderstandingClient,
} from './client';
import { formatContents } from './formatFields';

export type AnalyzeCardOptions = {
  poll?: PollOptions;
  log?: Log;
  resultsPath?: string;
};

export type AnalyzeCardOutcome = {
  status: string;
  fields: string[];
  response?: AnalyzeResultResponse;
};

function reportRequestError(log: Log, message: string, error: ContentUnderstandingError): AnalyzeCardOutcome {
  log(String(error.status));
  log(`ERROR: ${message}`);
  log(`Response: ${error.body}`);
  return { status: 'Failed', fields: [] };
}

/**
 * Send a business card image to an analyzer, wait for the result and print
 * every extracted field. The full response is kept in the results file.
 */
export async function analyzeCard(
  client: ContentUnderstandingClient,
  analyzer: string,
  imageFile: string,
  options: AnalyzeCardOptions = {},
): Promise<AnalyzeCardOutcome> {
  const log = options.log ?? console.log;
  const resultsPath = options.resultsPath ?? PATHS.RESULTS;

  log(`Analyzing ${imageFile}`);

  if (!fs.existsSync(imageFile)) {
    throw new Error(`Image file not found: ${imageFile}`);
  }
  const imageData = await fs.promises.readFile(imageFile);

  log('Submitting request...');
  let id: string;
  try {
    const submitted = await client.submitAnalyze(analyzer, imageData);
    log(String(submitted.status));
    id = submitted.id;
  } catch (e) {
    if (!(e instanceof ContentUnderstandingError)) throw e;
    return reportRequestError(log, 'Failed to submit image for analysis', e);
  }

  log('Getting results...');
  let response: AnalyzeResultResponse;
  try {
    response = await pollUntilTerminal(() => client.getAnalyzeResult(id), options.poll);
  } catch (e) {
    if (!(e instanceof ContentUnderstandingError)) throw e;
    return reportRequestError(log, 'Failed to retrieve analysis results', e);
  }

  const status = response.status ?? 'Unknown';
  if (!isSucceeded(status)) {
    log(`Analysis failed with status: ${status}\n`);
    log('Error details:');
    log(JSON.stringify(response, null, 2));
    return { status, fields: [], response };
  }

  log('Analysis succeeded:\n');
  await saveJson(resultsPath, response);
  log(`Response saved in ${resultsPath}\n`);

  const fields = formatContents(response.result?.contents ?? []);
  for (const line of fields) log(line);

  return { status, fields, response };
}
