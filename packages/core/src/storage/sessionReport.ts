import type { ValidationResult } from '../config/validate';
import { parseSessionReport } from '../config/validate';
import type { SessionReport } from '../models';
import { readJson, writeJsonAtomic } from './fsStore';

export async function saveSessionReport(filePath: string, report: SessionReport): Promise<void> {
  await writeJsonAtomic(filePath, report);
}

/** Reads a report written by `saveSessionReport`, ready to pass as `resume`. */
export async function loadSessionReport(filePath: string): Promise<ValidationResult<SessionReport>> {
  return readJson(filePath, parseSessionReport);
}
