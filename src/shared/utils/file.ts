import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { errorCode, errorMessage, safeJsonParse } from '@/shared/bestEffort';

const log = createLogger('Core', 'File');

/**
 * Ensures that the given directory path exists on disk.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Reads a JSON file and returns its parsed value.
 * `missing` distinguishes an absent file from one that exists but does not parse.
 */
export async function readJson(
  filePath: string,
): Promise<{ kind: 'ok'; data: unknown } | { kind: 'missing' } | { kind: 'invalid'; reason: string }> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return { kind: 'missing' };
    }
    log.warn('failed to read json', { filePath, error: errorMessage(error) });
    return { kind: 'invalid', reason: errorMessage(error) };
  }
  if (!content.trim()) {
    return { kind: 'ok', data: {} };
  }
  const parsed = safeJsonParse(content, {
    onError: 'debug',
    log,
    label: 'json parse failed',
    context: { filePath },
  });
  if (parsed === undefined) {
    log.warn('failed to read json', { filePath, error: 'invalid json' });
    return { kind: 'invalid', reason: 'invalid json' };
  }
  return { kind: 'ok', data: parsed };
}

/**
 * Serializes an object to JSON (pretty printed) and replaces the file in full.
 * The content lands in a sibling temp file first and is renamed over the target.
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
