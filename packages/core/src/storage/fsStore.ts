import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ValidationResult } from '../config/validate';

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const payload = `${JSON.stringify(data, null, 2)}\n`;
  const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
  await fs.writeFile(tmpPath, payload, 'utf-8');
  await fs.rename(tmpPath, filePath);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads a JSON file and hands the payload to `parse`. Read and syntax errors
 * come back as `Cannot read <file>: <reason>` instead of throwing.
 */
export async function readJson<T>(
  filePath: string,
  parse: (payload: unknown) => ValidationResult<T>,
): Promise<ValidationResult<T>> {
  let payload: unknown;
  try {
    payload = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, errors: [`Cannot read ${path.basename(filePath)}: ${reason}`] };
  }
  return parse(payload);
}
