import type { AnalyzeResultOutput } from '@azure-rest/ai-document-intelligence';

export type AnalyzedInvoice = NonNullable<AnalyzeResultOutput['documents']>[number];
type InvoiceField = NonNullable<AnalyzedInvoice['fields']>[string];

export type FieldSummary<T> = {
  value: T;
  confidence?: number;
};

export type CurrencySummary = {
  symbol: string;
  amount: number;
};

export type InvoiceSummary = {
  vendorName?: FieldSummary<string>;
  customerName?: FieldSummary<string>;
  invoiceTotal?: FieldSummary<CurrencySummary>;
};

function textField(field: InvoiceField | undefined): FieldSummary<string> | undefined {
  if (!field) return undefined;
  const value = field.valueString ?? field.content;
  if (value === undefined) return undefined;
  return { value, confidence: field.confidence };
}

function currencyField(field: InvoiceField | undefined): FieldSummary<CurrencySummary> | undefined {
  const currency = field?.valueCurrency;
  if (!field || !currency) return undefined;
  return {
    value: {
      symbol: currency.currencySymbol ?? currency.currencyCode ?? '',
      amount: currency.amount,
    },
    confidence: field.confidence,
  };
}

export function summarizeInvoice(document: AnalyzedInvoice): InvoiceSummary {
  const fields = document.fields ?? {};
  return {
    vendorName: textField(fields.VendorName),
    customerName: textField(fields.CustomerName),
    invoiceTotal: currencyField(fields.InvoiceTotal),
  };
}

function confidenceOf(summary: FieldSummary<unknown>): string {
  return summary.confidence === undefined ? 'unknown' : String(summary.confidence);
}

export function formatInvoiceSummary(summary: InvoiceSummary): string[] {
  const lines: string[] = [];
  const { vendorName, customerName, invoiceTotal } = summary;

  if (vendorName) {
    lines.push(`Vendor Name: ${vendorName.value}, with confidence ${confidenceOf(vendorName)}.`);
  }
  if (customerName) {
    lines.push(`Customer Name: '${customerName.value}', with confidence ${confidenceOf(customerName)}.`);
  }
  if (invoiceTotal) {
    const { symbol, amount } = invoiceTotal.value;
    lines.push(`Invoice Total: '${symbol}${amount}', with confidence ${confidenceOf(invoiceTotal)}.`);
  }

  return lines;
}
