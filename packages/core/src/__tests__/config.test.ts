import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadGameConfig } from '../config/loadConfig';
import { parseGameState, parseSessionReport, validateGameConfig } from '../config/validate';
import { createInitialState } from '../engine/game';
import type { GameState } from '../models';
import { createSampleGameConfig } from '../sample';
import { CLOCK_START } from './fakes';

describe('validateGameConfig', () => {
  it('accepts the sample configuration', () => {
    const sample = createSampleGameConfig();
    expect(validateGameConfig(sample)).toEqual({ ok: true, value: sample });
  });

  it('fills optional sections with defaults', () => {
    const { levels, flags } = createSampleGameConfig();
    const result = validateGameConfig({ levels, flags });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.hints).toEqual({});
      expect(result.value.requirements).toEqual({});
      expect(result.value.skills).toEqual([]);
    }
  });

  it('reports schema issues with their path', () => {
    const result = validateGameConfig({ levels: { level1: { level1: 'attacker' } }, flags: {} });
    expect(result).toEqual({
      ok: false,
      errors: ['levels.level1.level1: Expected array, received string'],
    });
  });

  it('requires a default branch for forked requirements', () => {
    const config = createSampleGameConfig();
    config.requirements.level4 = config.requirements.level4.slice(1);
    expect(validateGameConfig(config)).toEqual({
      ok: false,
      errors: ['Requirements for level4 need a default branch without requirements.'],
    });
  });

  it('checks references to levels and branches', () => {
    const config = createSampleGameConfig();
    config.requirements.level2 = [{ branch: 'level2x', requirements: null }];
    config.flags.level9 = 'flag-level-9';
    config.hints.level4.level4z = { nothing: 'Nothing to see.' };

    expect(validateGameConfig(config)).toEqual({
      ok: false,
      errors: [
        'Requirements for level2 reference unknown branch level2x.',
        'Flag registered for unknown level level9.',
        'Hints reference unknown branch level4z.',
      ],
    });
  });
});

function runningState(): GameState {
  return {
    level: 2,
    branch: '',
    lifecycle: 'in_progress',
    levelLog: ['level1', 'level2'],
    loadTimes: [30, 30],
    solvingTimes: [95],
    gameStartedAt: CLOCK_START,
    levelStartedAt: CLOCK_START + 95_000,
    gameEndedAt: 0,
  };
}

function finishedState(): GameState {
  return {
    ...runningState(),
    lifecycle: 'finished',
    solvingTimes: [95, 40],
    gameEndedAt: CLOCK_START + 135_000,
  };
}

describe('parseGameState', () => {
  it('accepts a fresh state', () => {
    expect(parseGameState(createInitialState())).toEqual({ ok: true, value: createInitialState() });
  });

  it('accepts running and finished games', () => {
    expect(parseGameState(runningState())).toEqual({ ok: true, value: runningState() });
    expect(parseGameState(finishedState())).toEqual({ ok: true, value: finishedState() });
  });

  it('rejects an unstarted state away from level 0', () => {
    expect(parseGameState({ ...createInitialState(), level: 2 })).toEqual({
      ok: false,
      errors: ['A game that has not started must sit on level 0 with an empty log.'],
    });
  });

  it('rejects an unstarted state with timings', () => {
    expect(parseGameState({ ...createInitialState(), loadTimes: [30] })).toEqual({
      ok: false,
      errors: ['A game that has not started cannot carry timings.'],
    });
  });

  it('rejects a level log that does not match the level', () => {
    expect(parseGameState({ ...runningState(), level: 3 })).toEqual({
      ok: false,
      errors: ['levelLog has 2 entries, expected 3.'],
    });
  });

  it('rejects load times that do not match the level log', () => {
    expect(parseGameState({ ...runningState(), loadTimes: [30] })).toEqual({
      ok: false,
      errors: ['loadTimes has 1 entries, expected 2.', 'solvingTimes has 1 entries, expected 0.'],
    });
  });

  it('expects one solving time fewer than load times while running', () => {
    expect(parseGameState({ ...runningState(), solvingTimes: [95, 10] })).toEqual({
      ok: false,
      errors: ['solvingTimes has 2 entries, expected 1.'],
    });
  });

  it('expects a solving time per load time once finished', () => {
    expect(parseGameState({ ...finishedState(), solvingTimes: [95] })).toEqual({
      ok: false,
      errors: ['solvingTimes has 1 entries, expected 2.'],
    });
  });

  it('rejects a branch that disagrees with the level log', () => {
    expect(parseGameState({ ...runningState(), branch: 'b' })).toEqual({
      ok: false,
      errors: ['The last levelLog entry is level2, expected level2b.'],
    });
  });

  it('requires start stamps on a started game', () => {
    expect(parseGameState({ ...runningState(), gameStartedAt: 0 })).toEqual({
      ok: false,
      errors: ['A started game needs gameStartedAt.'],
    });
    expect(parseGameState({ ...runningState(), levelStartedAt: CLOCK_START - 1000 })).toEqual({
      ok: false,
      errors: ['levelStartedAt cannot precede gameStartedAt.'],
    });
  });

  it('requires an end stamp on a finished game', () => {
    expect(parseGameState({ ...finishedState(), gameEndedAt: 0 })).toEqual({
      ok: false,
      errors: ['A finished game needs gameEndedAt at or after levelStartedAt.'],
    });
  });

  it('rejects a level 3 game with no log and stray load times', () => {
    const state = {
      level: 3,
      branch: '',
      lifecycle: 'in_progress',
      levelLog: [],
      loadTimes: [5, 5, 5, 5],
      solvingTimes: [],
      gameStartedAt: 0,
      levelStartedAt: 0,
      gameEndedAt: 0,
    };

    expect(parseGameState(state)).toEqual({
      ok: false,
      errors: [
        'levelLog has 0 entries, expected 3.',
        'loadTimes has 4 entries, expected 0.',
        'solvingTimes has 0 entries, expected 3.',
        'A started game needs gameStartedAt.',
      ],
    });
  });
});

describe('parseSessionReport', () => {
  const report = () => ({
    game: runningState(),
    hints: { totalTaken: 2, taken: { level1: ['scan', 'ports'] } },
    wrongFlags: { level1: ['wrong'] },
    skills: ['nmap'],
  });

  it('accepts a consistent report', () => {
    expect(parseSessionReport(report())).toEqual({ ok: true, value: report() });
  });

  it('reports schema issues with their path', () => {
    expect(parseSessionReport({ ...report(), skills: [''] })).toEqual({
      ok: false,
      errors: ['skills.0: String must contain at least 1 character(s)'],
    });
  });

  it('checks the game and the hint total', () => {
    const broken = {
      ...report(),
      game: { ...runningState(), gameStartedAt: 0 },
      hints: { totalTaken: 3, taken: { level1: ['scan'] } },
    };

    expect(parseSessionReport(broken)).toEqual({
      ok: false,
      errors: ['game: A started game needs gameStartedAt.', 'hints: totalTaken is 3, expected 1.'],
    });
  });
});

describe('loadGameConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vmquest-config-'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads the configuration directory', async () => {
    const sample = createSampleGameConfig();
    await fs.writeFile(path.join(dir, 'levels.json'), JSON.stringify(sample.levels));
    await fs.writeFile(path.join(dir, 'flags.json'), JSON.stringify(sample.flags));
    await fs.writeFile(path.join(dir, 'hints.json'), JSON.stringify(sample.hints));

    const result = await loadGameConfig(dir);

    expect(result).toEqual({
      ok: true,
      value: { ...sample, requirements: {}, skills: [] },
    });
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('requires the level and flag files', async () => {
    const sample = createSampleGameConfig();
    await fs.writeFile(path.join(dir, 'levels.json'), JSON.stringify(sample.levels));

    expect(await loadGameConfig(dir)).toEqual({
      ok: false,
      errors: [`Missing flags.json in ${dir}.`],
    });
  });

  it('reports unreadable JSON', async () => {
    await fs.writeFile(path.join(dir, 'levels.json'), '{ level1: ');
    await fs.writeFile(path.join(dir, 'flags.json'), '{}');

    const result = await loadGameConfig(dir);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].startsWith('Cannot read levels.json: ')).toBe(true);
    }
  });
});
