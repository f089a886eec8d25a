import {
  DEFAULT_POLL_INTERVAL_MS,
  isSucceeded,
  pollUntilTerminal,
  sleep,
  type PollOptions,
} from '@/polling/pollUntilTerminal';
import type { Log } from '@/output/log';
import {
  ContentUnderstandingError,
  type ContentUnderstandingClient,
  type OperationStatus,
} from './client';

export type CreateAnalyzerOptions = {
  poll?: PollOptions;
  log?: Log;
};

export type CreateAnalyzerOutcome = {
  status: string;
  operation?: OperationStatus;
};

/**
 * Replace an analyzer: delete any analyzer with the same name, PUT the
 * schema, then poll the Operation-Location until it finishes.
 */
export async function createAnalyzer(
  client: ContentUnderstandingClient,
  analyzer: string,
  schemaJson: string,
  options: CreateAnalyzerOptions = {},
): Promise<CreateAnalyzerOutcome> {
  const log = options.log ?? console.log;
  const wait = options.poll?.sleep ?? sleep;

  log(`Creating ${analyzer}`);

  const deleteStatus = await client.deleteAnalyzer(analyzer);
  log(String(deleteStatus));
  await wait(options.poll?.intervalMs ?? DEFAULT_POLL_INTERVAL_MS);

  let operationLocation: string;
  try {
    const put = await client.putAnalyzer(analyzer, schemaJson);
    log(String(put.status));
    operationLocation = put.operationLocation;
  } catch (e) {
    if (!(e instanceof ContentUnderstandingError)) throw e;
    log(String(e.status));
    log('ERROR: PUT request failed');
    log(`Response: ${e.body}`);
    return { status: 'Failed' };
  }

  const operation = await pollUntilTerminal(() => client.getOperation(operationLocation), options.poll);
  const status = operation.status ?? 'Unknown';
  log(status);

  if (isSucceeded(status)) {
    log(`Analyzer '${analyzer}' created successfully.`);
  } else {
    log('Analyzer creation failed.');
    log(JSON.stringify(operation, null, 2));
  }

  return { status, operation };
}
