import * as path from 'node:path';

const PROJECT_ROOT = process.cwd();

export const PATHS = {
  // Root directories
  ROOT: PROJECT_ROOT,
  PUBLIC: path.join(PROJECT_ROOT, 'public'),

  // Content Understanding assets
  ANALYZER_SCHEMA: path.join(PROJECT_ROOT, 'public', 'biz-card.json'),
  DEFAULT_CARD: path.join(PROJECT_ROOT, 'public', 'biz-card-1.png'),

  // Output
  RESULTS: path.join(PROJECT_ROOT, 'results.json'),
} as const;
