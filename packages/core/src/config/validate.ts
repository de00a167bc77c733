import type { ZodType, ZodTypeDef } from 'zod';
import { resolveBranchInput } from '../engine/branchInput';
import type { GameConfig, GameState, LevelGraphConfig, SessionReport } from '../models';
import { levelKey, levelName } from '../models';
import {
  GameConfigSchema,
  GameStateSchema,
  LEVEL_KEY_PATTERN,
  SessionReportSchema,
} from './schema';

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[] };

const formatPath = (path: (string | number)[]) => (path.length > 0 ? `${path.join('.')}: ` : '');

export function parseWith<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  payload: unknown,
): ValidationResult<T> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => `${formatPath(issue.path)}${issue.message}`),
    };
  }
  return { ok: true, value: parsed.data };
}

export function parseLevelNumber(key: string): number | null {
  const match = LEVEL_KEY_PATTERN.exec(key);
  return match ? Number(match[1]) : null;
}

export function validateLevelGraph(levels: LevelGraphConfig): string[] {
  const errors: string[] = [];
  const numbers: number[] = [];

  Object.entries(levels).forEach(([key, branches]) => {
    const level = parseLevelNumber(key);
    if (level === null) {
      errors.push(`Invalid level key: ${key}.`);
      return;
    }
    numbers.push(level);

    const names = Object.keys(branches);
    if (names.length === 0) {
      errors.push(`Level ${key} has no branches.`);
      return;
    }
    names.forEach((name) => {
      if (!name.startsWith(key)) {
        errors.push(`Branch ${name} does not belong to ${key}.`);
      }
    });
    if (names.length === 1 && names[0] !== key) {
      errors.push(`Unforked level ${key} must name its only branch ${key}, got ${names[0]}.`);
    }
  });

  const max = numbers.length > 0 ? Math.max(...numbers) : 0;
  for (let level = 1; level <= max; level += 1) {
    if (!numbers.includes(level)) {
      errors.push(`Missing ${levelKey(level)}: levels must be numbered contiguously from 1.`);
    }
  }

  return errors;
}

function validateCrossReferences(config: GameConfig): string[] {
  const errors: string[] = [];
  const branchNames = (level: number) => Object.keys(config.levels[levelKey(level)] ?? {});

  Object.entries(config.requirements).forEach(([key, candidates]) => {
    const level = parseLevelNumber(key);
    if (level === null || !Object.hasOwn(config.levels, key)) {
      errors.push(`Requirements reference unknown level ${key}.`);
      return;
    }
    candidates.forEach((candidate) => {
      if (!resolveBranchInput({ branchNames }, level, candidate.branch).ok) {
        errors.push(`Requirements for ${key} reference unknown branch ${candidate.branch}.`);
      }
    });
    if (candidates.length > 1 && !candidates.some((candidate) => candidate.requirements === null)) {
      errors.push(`Requirements for ${key} need a default branch without requirements.`);
    }
  });

  Object.keys(config.flags).forEach((key) => {
    if (!Object.hasOwn(config.levels, key)) {
      errors.push(`Flag registered for unknown level ${key}.`);
    }
  });

  Object.entries(config.hints).forEach(([key, byBranch]) => {
    if (!Object.hasOwn(config.levels, key)) {
      errors.push(`Hints reference unknown level ${key}.`);
      return;
    }
    Object.keys(byBranch).forEach((name) => {
      if (!Object.hasOwn(config.levels[key], name)) {
        errors.push(`Hints reference unknown branch ${name}.`);
      }
    });
  });

  return errors;
}

export function validateGameConfig(payload: unknown): ValidationResult<GameConfig> {
  const parsed = parseWith(GameConfigSchema, payload);
  if (!parsed.ok) {
    return parsed;
  }

  const config: GameConfig = parsed.value;
  const graphErrors = validateLevelGraph(config.levels);
  if (graphErrors.length > 0) {
    return { ok: false, errors: graphErrors };
  }

  const errors = validateCrossReferences(config);
  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return { ok: true, value: config };
}

/**
 * Bookkeeping rules a saved game must satisfy before it is resumed: one log
 * entry, one load time per level reached, one solving time per level left
 * behind (or per level, once finished), and start stamps for any started game.
 */
export function checkGameState(state: GameState): string[] {
  const { lifecycle, level, levelLog, loadTimes, solvingTimes } = state;
  const errors: string[] = [];

  if (lifecycle === 'not_started') {
    if (level !== 0 || levelLog.length > 0) {
      errors.push('A game that has not started must sit on level 0 with an empty log.');
    }
    const stamped = state.gameStartedAt !== 0 || state.levelStartedAt !== 0 || state.gameEndedAt !== 0;
    if (loadTimes.length > 0 || solvingTimes.length > 0 || stamped) {
      errors.push('A game that has not started cannot carry timings.');
    }
    return errors;
  }

  if (level < 1) {
    errors.push('A started game must be on level 1 or later.');
  }
  if (levelLog.length !== level) {
    errors.push(`levelLog has ${levelLog.length} entries, expected ${level}.`);
  }
  if (loadTimes.length !== levelLog.length) {
    errors.push(`loadTimes has ${loadTimes.length} entries, expected ${levelLog.length}.`);
  }
  const expectedSolving =
    lifecycle === 'finished' ? loadTimes.length : Math.max(0, loadTimes.length - 1);
  if (solvingTimes.length !== expectedSolving) {
    errors.push(`solvingTimes has ${solvingTimes.length} entries, expected ${expectedSolving}.`);
  }
  if (level >= 1 && levelLog.length === level) {
    const current = levelName(level, state.branch);
    if (levelLog[level - 1] !== current) {
      errors.push(`The last levelLog entry is ${levelLog[level - 1]}, expected ${current}.`);
    }
  }
  if (state.gameStartedAt <= 0) {
    errors.push('A started game needs gameStartedAt.');
  }
  if (state.levelStartedAt < state.gameStartedAt) {
    errors.push('levelStartedAt cannot precede gameStartedAt.');
  }
  if (lifecycle === 'finished' && state.gameEndedAt < state.levelStartedAt) {
    errors.push('A finished game needs gameEndedAt at or after levelStartedAt.');
  }
  return errors;
}

export function parseGameState(payload: unknown): ValidationResult<GameState> {
  const parsed = parseWith(GameStateSchema, payload);
  if (!parsed.ok) {
    return parsed;
  }
  const errors = checkGameState(parsed.value);
  return errors.length > 0 ? { ok: false, errors } : parsed;
}

export function parseSessionReport(payload: unknown): ValidationResult<SessionReport> {
  const parsed = parseWith(SessionReportSchema, payload);
  if (!parsed.ok) {
    return parsed;
  }
  const report = parsed.value;
  const errors = checkGameState(report.game).map((error) => `game: ${error}`);

  const recorded = Object.values(report.hints.taken).reduce((sum, names) => sum + names.length, 0);
  if (report.hints.totalTaken !== recorded) {
    errors.push(`hints: totalTaken is ${report.hints.totalTaken}, expected ${recorded}.`);
  }

  return errors.length > 0 ? { ok: false, errors } : parsed;
}
