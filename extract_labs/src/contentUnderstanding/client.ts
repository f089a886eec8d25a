import type { ContentUnderstandingConfig } from '@/config/env';
import type { StatusResponse } from '@/polling/pollUntilTerminal';

export const CU_VERSION = '2025-05-01-preview';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class ContentUnderstandingError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(message);
    this.name = 'ContentUnderstandingError';
  }
}

export type ContentField = {
  type: string;
  valueString?: string;
  valueNumber?: number;
  valueInteger?: number;
  valueDate?: string;
  valueTime?: string;
  valueBoolean?: boolean;
  valueArray?: ContentField[];
  valueObject?: Record<string, ContentField>;
  confidence?: number;
};

export type AnalyzedContent = {
  markdown?: string;
  kind?: string;
  fields?: Record<string, ContentField>;
};

export type OperationStatus = StatusResponse & {
  id?: string;
  error?: unknown;
};

export type AnalyzeResultResponse = OperationStatus & {
  result?: {
    analyzerId?: string;
    apiVersion?: string;
    createdAt?: string;
    contents?: AnalyzedContent[];
  };
};

export type PutAnalyzerResponse = {
  status: number;
  operationLocation: string;
};

export type SubmitAnalyzeResponse = {
  status: number;
  id: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJson<T>(response: Response): Promise<T> {
  const body: unknown = await response.json();
  if (!isRecord(body)) {
    throw new Error(`Unexpected response body: ${JSON.stringify(body)}`);
  }
  return body as T;
}

/**
 * Thin REST wrapper around the Content Understanding analyzer endpoints.
 * Every call authenticates with the resource key header.
 */
export class ContentUnderstandingClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: Pick<ContentUnderstandingConfig, 'endpoint' | 'key'>,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  analyzerUrl(analyzer: string): string {
    return `${this.config.endpoint}/contentunderstanding/analyzers/${analyzer}?api-version=${CU_VERSION}`;
  }

  analyzeUrl(analyzer: string): string {
    return `${this.config.endpoint}/contentunderstanding/analyzers/${analyzer}:analyze?api-version=${CU_VERSION}`;
  }

  resultUrl(id: string): string {
    return `${this.config.endpoint}/contentunderstanding/analyzerResults/${id}?api-version=${CU_VERSION}`;
  }

  private headers(contentType?: string): Record<string, string> {
    const headers: Record<string, string> = { 'Ocp-Apim-Subscription-Key': this.config.key };
    if (contentType) headers['Content-Type'] = contentType;
    return headers;
  }

  // 404 is not an error here
  async deleteAnalyzer(analyzer: string): Promise<number> {
    const response = await this.fetchImpl(this.analyzerUrl(analyzer), {
      method: 'DELETE',
      headers: this.headers(),
    });
    return response.status;
  }

  async putAnalyzer(analyzer: string, schemaJson: string): Promise<PutAnalyzerResponse> {
    const response = await this.fetchImpl(this.analyzerUrl(analyzer), {
      method: 'PUT',
      headers: this.headers('application/json'),
      body: schemaJson,
    });

    if (response.status >= 400) {
      const body = await response.text();
      throw new ContentUnderstandingError('PUT request failed', response.status, body);
    }

    const operationLocation = response.headers.get('operation-location');
    if (!operationLocation) {
      throw new Error('Response missing Operation-Location header');
    }

    return { status: response.status, operationLocation };
  }

  async getOperation(url: string): Promise<OperationStatus> {
    const response = await this.fetchImpl(url, { method: 'GET', headers: this.headers() });
    return readJson<OperationStatus>(response);
  }

  async submitAnalyze(analyzer: string, data: Uint8Array): Promise<SubmitAnalyzeResponse> {
    const response = await this.fetchImpl(this.analyzeUrl(analyzer), {
      method: 'POST',
      headers: this.headers('application/octet-stream'),
      body: data,
    });

    if (response.status >= 400) {
      const body = await response.text();
      throw new ContentUnderstandingError('Failed to submit image for analysis', response.status, body);
    }

    const json = await readJson<{ id?: unknown }>(response);
    const id = json.id;
    if (typeof id !== 'string' || !id) {
      throw new Error('No operation ID returned from the API');
    }

    return { status: response.status, id };
  }

  async getAnalyzeResult(id: string): Promise<AnalyzeResultResponse> {
    const response = await this.fetchImpl(this.resultUrl(id), { method: 'GET', headers: this.headers() });

    if (response.status >= 400) {
      const body = await response.text();
      throw new ContentUnderstandingError('Failed to retrieve analysis results', response.status, body);
    }

    return readJson<AnalyzeResultResponse>(response);
  }
}
