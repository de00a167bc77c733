export type Lifecycle = 'not_started' | 'in_progress' | 'finished';

export type BoxId = string;

/** `level4` → `{ level4a: [...boxes], level4b: [...boxes] }` */
export type LevelGraphConfig = Record<string, Record<string, BoxId[]>>;

/** `level4` → `level4a` → hint name → hint text */
export type HintCatalog = Record<string, Record<string, Record<string, string>>>;

/** `level4` → expected flag */
export type FlagRegistry = Record<string, string>;

export type BranchRequirements = {
  timeLimit: number;
  skill: string;
};

export type BranchCandidate = {
  branch: string;
  requirements: BranchRequirements | null;
};

export type RequirementTable = Record<string, BranchCandidate[]>;

export type KnownSkillSet = ReadonlySet<string>;

export type GameConfig = {
  levels: LevelGraphConfig;
  hints: HintCatalog;
  flags: FlagRegistry;
  requirements: RequirementTable;
  skills: string[];
};

export type GameState = {
  level: number;
  branch: string;
  lifecycle: Lifecycle;
  levelLog: string[];
  loadTimes: number[];
  solvingTimes: number[];
  gameStartedAt: number;
  levelStartedAt: number;
  gameEndedAt: number;
};

export type LevelTiming = {
  level: string;
  setup: boolean;
  loadTime?: number;
  solvingTime?: number;
};

export type GameSummary = {
  lifecycle: Lifecycle;
  level?: number;
  branch?: string;
  totalElapsed: number;
  levelLog: string[];
  timings: LevelTiming[];
};

export type HintLedgerSnapshot = {
  totalTaken: number;
  taken: Record<string, string[]>;
};

export type WrongFlagLog = Record<string, string[]>;

/** Everything a learner's session needs to pick up where it stopped. */
export type SessionReport = {
  game: GameState;
  hints: HintLedgerSnapshot;
  wrongFlags: WrongFlagLog;
  skills: string[];
};

/**
 * Brings level boxes up and down. `bringUp` resolves with the elapsed wall
 * time in seconds; rejections are provisioning failures.
 */
export type Provisioner = {
  bringUp(boxes: BoxId[], tag: string): Promise<number>;
  tearDown(): Promise<void>;
};

export const SETUP_TAG = 'setup';

export function levelKey(level: number): string {
  return `level${level}`;
}

export function levelName(level: number, branch: string): string {
  return `${levelKey(level)}${branch}`;
}
