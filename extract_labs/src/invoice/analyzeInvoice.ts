import DocumentIntelligence, {
  getLongRunningPoller,
  isUnexpected,
  type AnalyzeOperationOutput,
  type AnalyzeResultOutput,
  type DocumentIntelligenceClient,
} from '@azure-rest/ai-document-intelligence';
import { AzureKeyCredential } from '@azure/core-auth';
import type { DocumentIntelligenceConfig } from '@/config/env';
import type { Log } from '@/output/log';
import { formatInvoiceSummary, summarizeInvoice } from './summarizeInvoice';

export const SAMPLE_INVOICE_URL =
  'https://github.com/MicrosoftLearning/mslearn-ai-information-extraction/blob/main/Labfiles/prebuilt-doc-intelligence/sample-invoice/sample-invoice.pdf?raw=true';

// Invoice Model ID
export const INVOICE_MODEL_ID = 'prebuilt-invoice';

export type AnalyzeInvoiceRequest = {
  urlSource?: string;
  locale?: string;
  modelId?: string;
};

export function createInvoiceClient(config: DocumentIntelligenceConfig): DocumentIntelligenceClient {
  return DocumentIntelligence(config.endpoint, new AzureKeyCredential(config.key));
}

export async function analyzeInvoice(
  client: DocumentIntelligenceClient,
  request: AnalyzeInvoiceRequest = {},
): Promise<AnalyzeResultOutput> {
  const urlSource = request.urlSource ?? SAMPLE_INVOICE_URL;
  const locale = request.locale ?? 'en-US';
  const modelId = request.modelId ?? INVOICE_MODEL_ID;

  // Submit document for analysis
  const initialResponse = await client.path('/documentModels/{modelId}:analyze', modelId).post({
    contentType: 'application/json',
    body: { urlSource },
    queryParameters: { locale },
  });

  if (isUnexpected(initialResponse)) {
    throw new Error(`Failed to submit document: ${JSON.stringify(initialResponse.body.error)}`);
  }

  // Poll for results
  const poller = getLongRunningPoller(client, initialResponse);
  const result = (await poller.pollUntilDone()).body as AnalyzeOperationOutput;

  if (!result.analyzeResult) {
    throw new Error('No analyze result returned');
  }

  return result.analyzeResult;
}

/**
 * Analyze an invoice by URL and print vendor, customer and total for each
 * document the model found.
 */
export async function runInvoiceAnalysis(
  client: DocumentIntelligenceClient,
  request: AnalyzeInvoiceRequest = {},
  log: Log = console.log,
): Promise<AnalyzeResultOutput> {
  const result = await analyzeInvoice(client, request);

  for (const document of result.documents ?? []) {
    log('');
    for (const line of formatInvoiceSummary(summarizeInvoice(document))) log(line);
  }

  return result;
}
