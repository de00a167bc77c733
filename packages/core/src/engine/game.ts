import type { LevelGraph } from '../graph/levelGraph';
import type { GameState, GameSummary, LevelTiming, Provisioner } from '../models';
import { SETUP_TAG, levelKey, levelName } from '../models';
import { resolveBranchInput } from './branchInput';
import type { EngineResult } from './results';
import { fail, succeed } from './results';
import type { TraceEvent, TraceGate } from './trace';
import { pushTrace } from './trace';

export type GameOptions = {
  graph: LevelGraph;
  provisioner: Provisioner;
  /** Epoch milliseconds. */
  now?: () => number;
  trace?: TraceEvent[];
  /** Resume from a snapshot instead of a fresh, unstarted game. */
  state?: GameState;
};

export type Game = {
  state(): GameState;
  start(): Promise<EngineResult<GameState>>;
  advance(branchToken?: string): Promise<EngineResult<GameState>>;
  finish(): EngineResult<GameState>;
  abort(): Promise<GameState>;
  summary(): GameSummary;
  levelElapsed(): number;
  nextLevelExists(): boolean;
  nextLevelIsForked(): boolean;
  nextBranchNames(): string[];
  isLastLevel(): boolean;
};

export function createInitialState(): GameState {
  return {
    level: 0,
    branch: '',
    lifecycle: 'not_started',
    levelLog: [],
    loadTimes: [],
    solvingTimes: [],
    gameStartedAt: 0,
    levelStartedAt: 0,
    gameEndedAt: 0,
  };
}

export function cloneState(state: GameState): GameState {
  return {
    ...state,
    levelLog: [...state.levelLog],
    loadTimes: [...state.loadTimes],
    solvingTimes: [...state.solvingTimes],
  };
}

const toSeconds = (ms: number) => Math.max(0, Math.floor(ms / 1000));

export function createGame(options: GameOptions): Game {
  const { graph, provisioner, trace } = options;
  const now = options.now ?? Date.now;
  let state = options.state ? cloneState(options.state) : createInitialState();

  const reject = (gate: TraceGate, result: EngineResult<never>): EngineResult<never> => {
    if (!result.ok) {
      pushTrace(
        trace,
        {
          gate,
          outcome: 'rejected',
          code: result.error.code,
          meta: { level: state.level, branch: state.branch },
        },
        now,
      );
    }
    return result;
  };

  const nextLevelExists = () => graph.exists(state.level + 1);

  const start = async (): Promise<EngineResult<GameState>> => {
    if (state.lifecycle !== 'not_started') {
      return reject(
        'start',
        fail('already_started', 'A game is already in progress or finished; abort it first.'),
      );
    }

    state.lifecycle = 'in_progress';
    state.level = 1;
    state.branch = '';
    state.levelLog.push(levelKey(1));
    // Restamped below once setup succeeds.
    state.gameStartedAt = now();
    state.levelStartedAt = state.gameStartedAt;

    const loadTime = await provisioner.bringUp([], SETUP_TAG);
    state.loadTimes.push(loadTime);
    state.gameStartedAt = now();
    state.levelStartedAt = state.gameStartedAt;

    pushTrace(trace, { gate: 'start', outcome: 'ok', meta: { level: 1, loadTime } }, now);
    return succeed(cloneState(state));
  };

  const advance = async (branchToken = ''): Promise<EngineResult<GameState>> => {
    if (state.lifecycle !== 'in_progress') {
      return reject('advance', fail('not_started', "Can't continue, start the game first."));
    }
    const nextLevel = state.level + 1;
    if (!graph.exists(nextLevel)) {
      return reject(
        'advance',
        fail('no_next_level', 'No next level found. Perhaps the game is already complete?'),
      );
    }

    let nextBranch = '';
    if (graph.isForked(nextLevel)) {
      const resolved = resolveBranchInput(graph, nextLevel, branchToken);
      if (!resolved.ok) {
        return reject('advance', resolved);
      }
      nextBranch = resolved.value;
    } else if (branchToken !== '') {
      return reject(
        'advance',
        fail('unexpected_branch', `Level ${nextLevel} has no branches, but ${branchToken} was given.`),
      );
    }

    // Provisioning below may throw; the level and log stay advanced if it does.
    state.solvingTimes.push(toSeconds(now() - state.levelStartedAt));
    state.level = nextLevel;
    state.branch = nextBranch;
    const name = levelName(nextLevel, nextBranch);
    state.levelLog.push(name);

    const boxes = graph.boxesFor(nextLevel, name) ?? [];
    const loadTime = await provisioner.bringUp(boxes, name);
    state.loadTimes.push(loadTime);
    state.levelStartedAt = now();

    pushTrace(
      trace,
      {
        gate: 'advance',
        outcome: 'ok',
        meta: { level: nextLevel, branch: nextBranch, levelName: name, boxes, loadTime },
      },
      now,
    );
    return succeed(cloneState(state));
  };

  const finish = (): EngineResult<GameState> => {
    if (state.lifecycle !== 'in_progress') {
      return reject('finish', fail('not_started', 'There is no game in progress to finish.'));
    }
    if (nextLevelExists()) {
      return reject(
        'finish',
        fail('not_eligible', 'The game can only be finished from its last level.'),
      );
    }

    state.solvingTimes.push(toSeconds(now() - state.levelStartedAt));
    state.gameEndedAt = now();
    state.lifecycle = 'finished';

    pushTrace(
      trace,
      {
        gate: 'finish',
        outcome: 'ok',
        meta: { level: state.level, totalElapsed: toSeconds(state.gameEndedAt - state.gameStartedAt) },
      },
      now,
    );
    return succeed(cloneState(state));
  };

  const abort = async (): Promise<GameState> => {
    const abortedAt = state.level;
    try {
      await provisioner.tearDown();
    } finally {
      state = createInitialState();
      pushTrace(trace, { gate: 'abort', outcome: 'ok', meta: { level: abortedAt } }, now);
    }
    return cloneState(state);
  };

  const summary = (): GameSummary => {
    const timings: LevelTiming[] = state.levelLog.map((level, index) => {
      const timing: LevelTiming = { level, setup: index === 0 };
      if (index < state.loadTimes.length) {
        timing.loadTime = state.loadTimes[index];
      }
      if (index < state.solvingTimes.length) {
        timing.solvingTime = state.solvingTimes[index];
      }
      return timing;
    });

    const base = { lifecycle: state.lifecycle, levelLog: [...state.levelLog], timings };
    switch (state.lifecycle) {
      case 'in_progress':
        return {
          ...base,
          level: state.level,
          branch: state.branch,
          totalElapsed: toSeconds(now() - state.gameStartedAt),
        };
      case 'finished':
        return { ...base, totalElapsed: toSeconds(state.gameEndedAt - state.gameStartedAt) };
      default:
        return { ...base, totalElapsed: 0 };
    }
  };

  return {
    state: () => cloneState(state),
    start,
    advance,
    finish,
    abort,
    summary,
    levelElapsed: () =>
      state.lifecycle === 'in_progress' ? toSeconds(now() - state.levelStartedAt) : 0,
    nextLevelExists,
    nextLevelIsForked: () => graph.isForked(state.level + 1),
    nextBranchNames: () => graph.branchNames(state.level + 1),
    isLastLevel: () => state.level > 0 && !nextLevelExists(),
  };
}
