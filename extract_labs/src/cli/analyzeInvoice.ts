import { loadDocumentIntelligenceConfig } from '@/config/env';
import { createInvoiceClient, runInvoiceAnalysis, SAMPLE_INVOICE_URL } from '@/invoice/analyzeInvoice';
import { describeError } from '@/output/log';

async function main() {
  console.clear();

  try {
    const config = loadDocumentIntelligenceConfig();
    const urlSource = process.argv[2] ?? SAMPLE_INVOICE_URL;

    console.log(`\nConnecting to Document Intelligence at: ${config.endpoint}`);
    console.log(`Analyzing invoice at: ${urlSource}`);

    const client = createInvoiceClient(config);
    await runInvoiceAnalysis(client, { urlSource, locale: 'en-US' });
  } catch (e) {
    console.error(describeError(e));
  }

  console.log('\nAnalysis complete.\n');
}

main().catch(console.error);
