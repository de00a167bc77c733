import path from 'node:path';
import type { GameConfig } from '../models';
import { fileExists, readJson } from '../storage/fsStore';
import {
  FlagRegistrySchema,
  HintCatalogSchema,
  LevelGraphSchema,
  RequirementTableSchema,
  SkillListSchema,
} from './schema';
import type { ValidationResult } from './validate';
import { parseWith, validateGameConfig } from './validate';

const CONFIG_FIELDS = ['levels', 'flags', 'hints', 'requirements', 'skills'] as const;

type ConfigField = (typeof CONFIG_FIELDS)[number];

const OPTIONAL_FIELDS = new Set<ConfigField>(['hints', 'requirements', 'skills']);

const FIELD_PARSERS: Record<ConfigField, (payload: unknown) => ValidationResult<unknown>> = {
  levels: (payload) => parseWith(LevelGraphSchema, payload),
  flags: (payload) => parseWith(FlagRegistrySchema, payload),
  hints: (payload) => parseWith(HintCatalogSchema, payload),
  requirements: (payload) => parseWith(RequirementTableSchema, payload),
  skills: (payload) => parseWith(SkillListSchema, payload),
};

function parseFile(field: ConfigField, payload: unknown): ValidationResult<unknown> {
  const parsed = FIELD_PARSERS[field](payload);
  if (parsed.ok) {
    return parsed;
  }
  return { ok: false, errors: parsed.errors.map((error) => `${field}.json: ${error}`) };
}

/**
 * Config root. `VMQUEST_CONFIG_DIR` wins; otherwise `resources/` under the
 * working directory.
 */
export function getConfigRoot(): string {
  const fromEnv = process.env.VMQUEST_CONFIG_DIR;
  if (fromEnv) return path.resolve(fromEnv);
  return path.join(process.cwd(), 'resources');
}

export async function loadGameConfig(
  dir: string = getConfigRoot(),
): Promise<ValidationResult<GameConfig>> {
  const payload: Partial<Record<ConfigField, unknown>> = {};
  const errors: string[] = [];

  for (const field of CONFIG_FIELDS) {
    const file = `${field}.json`;
    const filePath = path.join(dir, file);
    if (!(await fileExists(filePath))) {
      if (OPTIONAL_FIELDS.has(field)) {
        console.warn(`[config] ${file} not found in ${dir}, using defaults`);
      } else {
        errors.push(`Missing ${file} in ${dir}.`);
      }
      continue;
    }
    const read = await readJson(filePath, (raw) => parseFile(field, raw));
    if (read.ok) {
      payload[field] = read.value;
    } else {
      errors.push(...read.errors);
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return validateGameConfig(payload);
}
