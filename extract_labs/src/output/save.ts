import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Write a JSON payload with 4-space indentation, creating the parent
 * directory when needed.
 */
export async function saveJson(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) await fs.promises.mkdir(dir, { recursive: true });

  await fs.promises.writeFile(filePath, JSON.stringify(data, null, 4), 'utf8');
}
