import { AzureKeyCredential } from '@azure/core-auth';
import { SearchClient } from '@azure/search-documents';
import type { SearchConfig } from '@/config/env';

/** Fields of the knowledge-mining index we read back. */
export type IndexedDocument = {
  metadata_storage_name: string;
  locations?: string[];
  people?: string[];
  keyphrases?: string[];
};

export type SearchPage = {
  count?: number;
  documents: IndexedDocument[];
};

export interface DocumentSearcher {
  search(queryText: string): Promise<SearchPage>;
}

export class AzureDocumentSearcher implements DocumentSearcher {
  private readonly client: SearchClient<IndexedDocument>;

  constructor(config: SearchConfig) {
    this.client = new SearchClient<IndexedDocument>(
      config.endpoint,
      config.indexName,
      new AzureKeyCredential(config.queryKey),
    );
  }

  async search(queryText: string): Promise<SearchPage> {
    const found = await this.client.search(queryText, {
      select: ['metadata_storage_name', 'locations', 'people', 'keyphrases'],
      orderBy: ['metadata_storage_name'],
      includeTotalCount: true,
    });

    const documents: IndexedDocument[] = [];
    for await (const result of found.results) {
      const doc = result.document;
      documents.push({
        metadata_storage_name: doc.metadata_storage_name,
        locations: doc.locations,
        people: doc.people,
        keyphrases: doc.keyphrases,
      });
    }

    return { count: found.count, documents };
  }
}

function listSection(title: string, values: string[] | undefined): string[] {
  return [` - ${title}:`, ...(values ?? []).map((value) => `   - ${value}`)];
}

export function formatSearchResults(page: SearchPage): string[] {
  const count = page.count ?? page.documents.length;
  const lines = ['', `Search returned ${count} documents:`];

  for (const document of page.documents) {
    lines.push('', `Document: ${document.metadata_storage_name}`);
    lines.push(...listSection('Locations', document.locations));
    lines.push(...listSection('People', document.people));
    lines.push(...listSection('Key phrases', document.keyphrases));
  }

  return lines;
}
