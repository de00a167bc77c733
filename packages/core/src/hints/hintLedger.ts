import type { EngineResult } from '../engine/results';
import { fail, succeed } from '../engine/results';
import type { HintCatalog, HintLedgerSnapshot } from '../models';
import { levelKey, levelName } from '../models';

export type HintLedger = {
  listHints(level: number, branch: string): string[];
  hasHint(level: number, branch: string, name: string): boolean;
  takeHint(level: number, branch: string, name: string): EngineResult<string>;
  takenHints(level: number, branch: string): string[];
  totalTaken(): number;
  restart(): void;
  snapshot(): HintLedgerSnapshot;
};

/**
 * Hands out hints per (level, branch) and remembers which ones the learner has
 * seen. Independent of the game lifecycle: aborting a game does not reset it.
 */
export function createHintLedger(
  catalog: HintCatalog,
  snapshot?: HintLedgerSnapshot,
): HintLedger {
  let taken = new Map<string, string[]>(
    Object.entries(snapshot?.taken ?? {}).map(([key, names]) => [key, [...new Set(names)]]),
  );
  let total = snapshot?.totalTaken ?? 0;

  const hintsFor = (level: number, branch: string): Record<string, string> => {
    const key = levelKey(level);
    const name = levelName(level, branch);
    if (!Object.hasOwn(catalog, key) || !Object.hasOwn(catalog[key], name)) {
      return {};
    }
    return catalog[key][name];
  };

  const hasHint = (level: number, branch: string, name: string) =>
    Object.hasOwn(hintsFor(level, branch), name);

  return {
    listHints: (level, branch) => Object.keys(hintsFor(level, branch)),
    hasHint,
    takeHint: (level, branch, name) => {
      if (!hasHint(level, branch, name)) {
        return fail('unknown_hint', `No hint called ${name} for ${levelName(level, branch)}.`);
      }
      const key = levelName(level, branch);
      const seen = taken.get(key) ?? [];
      if (!seen.includes(name)) {
        taken.set(key, [...seen, name]);
        total += 1;
      }
      return succeed(hintsFor(level, branch)[name]);
    },
    takenHints: (level, branch) => [...(taken.get(levelName(level, branch)) ?? [])],
    totalTaken: () => total,
    restart: () => {
      taken = new Map();
      total = 0;
    },
    snapshot: () => ({
      totalTaken: total,
      taken: Object.fromEntries([...taken].map(([key, names]) => [key, [...names]])),
    }),
  };
}
