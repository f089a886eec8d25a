import dotenv from 'dotenv';

dotenv.config();

export type Env = Record<string, string | undefined>;

export type ContentUnderstandingConfig = {
  endpoint: string;
  key: string;
  analyzer: string;
};

export type DocumentIntelligenceConfig = {
  endpoint: string;
  key: string;
};

export type SearchConfig = {
  endpoint: string;
  queryKey: string;
  indexName: string;
};

export function requireEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) throw new Error(`❌ ${name} not found`);
  return value;
}

function trimEndpoint(endpoint: string): string {
  return endpoint.replace(/\/+$/, '');
}

export function loadContentUnderstandingConfig(env: Env = process.env): ContentUnderstandingConfig {
  return {
    endpoint: trimEndpoint(requireEnv(env, 'ENDPOINT')),
    key: requireEnv(env, 'KEY'),
    analyzer: requireEnv(env, 'ANALYZER_NAME'),
  };
}

export function loadDocumentIntelligenceConfig(env: Env = process.env): DocumentIntelligenceConfig {
  return {
    endpoint: trimEndpoint(requireEnv(env, 'ENDPOINT')),
    key: requireEnv(env, 'KEY'),
  };
}

export function loadSearchConfig(env: Env = process.env): SearchConfig {
  return {
    endpoint: trimEndpoint(requireEnv(env, 'SEARCH_ENDPOINT')),
    queryKey: requireEnv(env, 'QUERY_KEY'),
    indexName: requireEnv(env, 'INDEX_NAME'),
  };
}
