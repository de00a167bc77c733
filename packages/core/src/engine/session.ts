import path from 'node:path';
import type { FlagValidator } from '../flags/flagValidator';
import { createFlagValidator } from '../flags/flagValidator';
import type { LevelGraph } from '../graph/levelGraph';
import { createLevelGraph } from '../graph/levelGraph';
import type { HintLedger } from '../hints/hintLedger';
import { createHintLedger } from '../hints/hintLedger';
import type { GameConfig, GameState, Provisioner, SessionReport } from '../models';
import { saveSessionReport } from '../storage/sessionReport';
import type { Game } from './game';
import { createGame } from './game';
import type { EngineResult } from './results';
import { fail, succeed } from './results';
import { addKnownSkill, createSkillSet, selectNextBranch } from './selectBranch';
import type { TraceEvent } from './trace';
import { pushTrace } from './trace';

export type SessionOptions = {
  config: GameConfig;
  provisioner: Provisioner;
  now?: () => number;
  trace?: TraceEvent[];
  /** When set, abort writes `aborted_game_<ms>.json` here first. */
  reportDir?: string;
  /** A report from `report()` or `loadSessionReport`. */
  resume?: SessionReport;
};

export type Session = {
  graph: LevelGraph;
  game: Game;
  hints: HintLedger;
  flags: FlagValidator;
  knownSkills(): string[];
  start(skills?: Iterable<string>): Promise<EngineResult<GameState>>;
  submitFlag(flag: string): EngineResult<boolean>;
  advance(branchToken?: string): Promise<EngineResult<GameState>>;
  advanceAdaptive(): Promise<EngineResult<GameState>>;
  finish(): EngineResult<GameState>;
  currentHints(): EngineResult<string[]>;
  takeCurrentHint(name: string): EngineResult<string>;
  abort(): Promise<GameState>;
  report(): SessionReport;
};

/**
 * One learner's engine: game, hints, flags and skills. Sessions share nothing,
 * so each learner needs their own.
 */
export function createSession(options: SessionOptions): Session {
  const { config, provisioner, trace, reportDir, resume } = options;
  const now = options.now ?? Date.now;

  const graph = createLevelGraph(config.levels);
  const game = createGame({ graph, provisioner, now, trace, state: resume?.game });
  const hints = createHintLedger(config.hints, resume?.hints);
  const flags = createFlagValidator(config.flags, resume?.wrongFlags);
  const skills = createSkillSet(resume?.skills);

  const inProgress = () => game.state().lifecycle === 'in_progress';
  const notRunning = () => fail('not_started', 'Game not started.');

  const report = (): SessionReport => ({
    game: game.state(),
    hints: hints.snapshot(),
    wrongFlags: flags.snapshot(),
    skills: [...skills],
  });

  return {
    graph,
    game,
    hints,
    flags,
    knownSkills: () => [...skills],
    start: async (quizSkills = []) => {
      if (game.state().lifecycle === 'not_started') {
        skills.clear();
        for (const skill of quizSkills) {
          addKnownSkill(skills, skill);
        }
      }
      return game.start();
    },
    submitFlag: (flag) => {
      if (!inProgress()) {
        return notRunning();
      }
      const level = game.state().level;
      const correct = flags.check(level, flag);
      pushTrace(trace, { gate: 'flag', outcome: correct ? 'ok' : 'rejected', meta: { level } }, now);
      return succeed(correct);
    },
    advance: (branchToken) => game.advance(branchToken),
    advanceAdaptive: async () => {
      if (!inProgress() || !game.nextLevelIsForked()) {
        return game.advance();
      }
      const selected = selectNextBranch(
        config.requirements,
        game.state().level,
        game.levelElapsed(),
        skills,
      );
      if (!selected.ok) {
        return selected;
      }
      return game.advance(selected.value);
    },
    finish: () => game.finish(),
    currentHints: () => {
      if (!inProgress()) {
        return notRunning();
      }
      const { level, branch } = game.state();
      return succeed(hints.listHints(level, branch));
    },
    takeCurrentHint: (name) => {
      if (!inProgress()) {
        return notRunning();
      }
      const { level, branch } = game.state();
      return hints.takeHint(level, branch, name);
    },
    abort: async () => {
      if (reportDir) {
        const filePath = path.join(reportDir, `aborted_game_${now()}.json`);
        try {
          await saveSessionReport(filePath, report());
        } catch (error) {
          console.warn('[session] failed to save aborted game report', filePath, error);
        }
      }
      try {
        return await game.abort();
      } finally {
        hints.restart();
      }
    },
    report,
  };
}
