import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Write JSON to a file atomically.
 *
 * Writes to a uniquely named temporary file next to the target, then renames it
 * over the target. A crash mid-write leaves the previous file intact.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options: { pretty?: boolean } = {},
): Promise<void> {
  const { pretty = true } = options;
  const content = JSON.stringify(data, null, pretty ? 2 : 0);

  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tmpPath = `${filePath}.${randomUUID()}.tmp`;

  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Read and parse a JSON file.
 * Returns null if the file doesn't exist.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
