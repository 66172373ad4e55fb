import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage, safeJsonParse } from '@/shared/bestEffort';

const log = createLogger('Core', 'File');
const INVALID_JSON = Symbol('invalid-json');

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function readFileBuffer(filePath: string): Promise<Buffer> {
  return fs.readFile(filePath);
}

/**
 * Writes a binary file, creating parent directories as needed.
 */
export async function writeFileBuffer(filePath: string, data: Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, data);
}

/**
 * Reads a JSON file and returns its parsed value (or undefined if missing or invalid).
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      log.warn('failed to read json', { filePath, error: errorMessage(error) });
    }
    return undefined;
  }
  const parsed = safeJsonParse(content, INVALID_JSON, {
    onError: 'debug',
    log,
    label: 'json parse failed',
    context: { filePath },
  });
  if (parsed === INVALID_JSON) {
    log.warn('failed to read json', { filePath, error: 'invalid json' });
    return undefined;
  }
  return parsed;
}

/**
 * Serializes a value to pretty-printed JSON on disk.
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}
