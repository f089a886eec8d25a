import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { analyzeCard } from '@/contentUnderstanding/analyzeCard';
import { ContentUnderstandingClient } from '@/contentUnderstanding/client';
import { createMockFetch, requestOf } from '../../helpers/mocks';
import { captureLog, createNoopSleep, jsonResponse, textResponse } from '../../helpers/testUtils';
import { createMockCardResult, TEST_CONFIG } from '../../fixtures/mockData';

describe('analyzeCard', () => {
  let workDir: string;
  let imageFile: string;
  let resultsPath: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'analyze-card-'));
    imageFile = path.join(workDir, 'card.png');
    resultsPath = path.join(workDir, 'out', 'results.json');
    fs.writeFileSync(imageFile, Buffer.from([0x89, 0x50, 0x4e, 0x47]));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('正常系', () => {
    it('送信 → ポーリング → 結果保存 → フィールド表示', async () => {
      const cardResult = createMockCardResult();
      const fetchMock = createMockFetch([
        jsonResponse(202, { id: 'op-123', status: 'Running' }),
        jsonResponse(200, { id: 'op-123', status: 'Running' }),
        jsonResponse(200, cardResult),
      ]);
      const client = new ContentUnderstandingClient(TEST_CONFIG, fetchMock);
      const { lines, log } = captureLog();

      const outcome = await analyzeCard(client, 'card', imageFile, {
        poll: { sleep: createNoopSleep() },
        log,
        resultsPath,
      });

      expect(outcome.status).toBe('Succeeded');
      expect(outcome.fields).toEqual(['ContactName: Jane Tester', 'EmailAddress: jane@example.com', 'Extension: 42']);
      expect(lines).toEqual([
        `Analyzing ${imageFile}`,
        'Submitting request...',
        '202',
        'Getting results...',
        'Analysis succeeded:\n',
        `Response saved in ${resultsPath}\n`,
        'ContactName: Jane Tester',
        'EmailAddress: jane@example.com',
        'Extension: 42',
      ]);

      // 画像バイトがそのまま送られる
      const body = requestOf(fetchMock, 0).init.body;
      expect(body).toEqual(Buffer.from([0x89, 0x50, 0x4e, 0x47]));
      expect(requestOf(fetchMock, 2).url).toBe(
        'https://test-resource.example.com/contentunderstanding/analyzerResults/op-123?api-version=2025-05-01-preview',
      );

      const saved = fs.readFileSync(resultsPath, 'utf8');
      expect(saved).toBe(JSON.stringify(cardResult, null, 4));
    });
  });

  describe('異常系', () => {
    it('解析が Failed ならエラー詳細を表示し、結果は保存しない', async () => {
      const failed = { id: 'op-123', status: 'Failed', error: { message: 'unreadable image' } };
      const fetchMock = createMockFetch([jsonResponse(202, { id: 'op-123' }), jsonResponse(200, failed)]);
      const client = new ContentUnderstandingClient(TEST_CONFIG, fetchMock);
      const { lines, log } = captureLog();

      const outcome = await analyzeCard(client, 'card', imageFile, {
        poll: { sleep: createNoopSleep() },
        log,
        resultsPath,
      });

      expect(outcome).toEqual({ status: 'Failed', fields: [], response: failed });
      expect(lines.slice(4)).toEqual([
        'Analysis failed with status: Failed\n',
        'Error details:',
        JSON.stringify(failed, null, 2),
      ]);
      expect(fs.existsSync(resultsPath)).toBe(false);
    });

    it('送信に失敗したらレスポンス本文を表示する', async () => {
      const fetchMock = createMockFetch([textResponse(415, 'unsupported media')]);
      const client = new ContentUnderstandingClient(TEST_CONFIG, fetchMock);
      const { lines, log } = captureLog();

      const outcome = await analyzeCard(client, 'card', imageFile, { log, resultsPath });

      expect(outcome).toEqual({ status: 'Failed', fields: [] });
      expect(lines).toEqual([
        `Analyzing ${imageFile}`,
        'Submitting request...',
        '415',
        'ERROR: Failed to submit image for analysis',
        'Response: unsupported media',
      ]);
    });

    it('結果の取得に失敗したらレスポンス本文を表示する', async () => {
      const fetchMock = createMockFetch([jsonResponse(202, { id: 'op-123' }), textResponse(404, 'not found')]);
      const client = new ContentUnderstandingClient(TEST_CONFIG, fetchMock);
      const { lines, log } = captureLog();

      const outcome = await analyzeCard(client, 'card', imageFile, {
        poll: { sleep: createNoopSleep() },
        log,
        resultsPath,
      });

      expect(outcome.status).toBe('Failed');
      expect(lines.slice(4)).toEqual(['404', 'ERROR: Failed to retrieve analysis results', 'Response: not found']);
    });

    it('画像ファイルがなければエラー', async () => {
      const client = new ContentUnderstandingClient(TEST_CONFIG, createMockFetch([]));
      const missing = path.join(workDir, 'missing.png');

      await expect(analyzeCard(client, 'card', missing, { log: () => {} })).rejects.toThrow(
        `Image file not found: ${missing}`,
      );
    });
  });
});
