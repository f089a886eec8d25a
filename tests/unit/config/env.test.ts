import { describe, it, expect } from 'vitest';
import {
  loadContentUnderstandingConfig,
  loadDocumentIntelligenceConfig,
  loadSearchConfig,
  requireEnv,
} from '@/config/env';

describe('requireEnv', () => {
  it('値を返す（前後の空白は除去）', () => {
    expect(requireEnv({ KEY: '  test-key ' }, 'KEY')).toBe('test-key');
  });

  it('未設定の場合はエラー', () => {
    expect(() => requireEnv({}, 'KEY')).toThrow('❌ KEY not found');
  });

  it('空文字の場合もエラー', () => {
    expect(() => requireEnv({ KEY: '   ' }, 'KEY')).toThrow('❌ KEY not found');
  });
});

describe('loadContentUnderstandingConfig', () => {
  it('エンドポイント末尾のスラッシュを除去する', () => {
    const config = loadContentUnderstandingConfig({
      ENDPOINT: 'https://test-resource.example.com//',
      KEY: 'test-key',
      ANALYZER_NAME: 'card-analyzer',
    });

    expect(config).toEqual({
      endpoint: 'https://test-resource.example.com',
      key: 'test-key',
      analyzer: 'card-analyzer',
    });
  });

  it('ANALYZER_NAME がなければエラー', () => {
    expect(() =>
      loadContentUnderstandingConfig({ ENDPOINT: 'https://test-resource.example.com', KEY: 'test-key' }),
    ).toThrow('❌ ANALYZER_NAME not found');
  });
});

describe('loadDocumentIntelligenceConfig', () => {
  it('ENDPOINT と KEY を読む', () => {
    expect(loadDocumentIntelligenceConfig({ ENDPOINT: 'https://di.example.com/', KEY: 'test-key' })).toEqual({
      endpoint: 'https://di.example.com',
      key: 'test-key',
    });
  });
});

describe('loadSearchConfig', () => {
  it('検索用の変数を読む', () => {
    const config = loadSearchConfig({
      SEARCH_ENDPOINT: 'https://search.example.com',
      QUERY_KEY: 'test-query-key',
      INDEX_NAME: 'test-index',
    });

    expect(config).toEqual({
      endpoint: 'https://search.example.com',
      queryKey: 'test-query-key',
      indexName: 'test-index',
    });
  });

  it('QUERY_KEY がなければエラー', () => {
    expect(() => loadSearchConfig({ SEARCH_ENDPOINT: 'https://search.example.com', INDEX_NAME: 'i' })).toThrow(
      '❌ QUERY_KEY not found',
    );
  });
});
