import { validateLevelGraph } from '../config/validate';
import type { BoxId, LevelGraphConfig } from '../models';
import { levelKey } from '../models';

export type LevelGraph = {
  exists(level: number): boolean;
  isForked(level: number): boolean;
  branchNames(level: number): string[];
  boxesFor(level: number, branchName: string): BoxId[] | undefined;
  levelCount(): number;
};

/**
 * Freezes a level mapping into a read-only graph. Throws when the mapping is
 * malformed; queries never throw.
 */
export function createLevelGraph(config: LevelGraphConfig): LevelGraph {
  const errors = validateLevelGraph(config);
  if (errors.length > 0) {
    throw new Error(`invalid_level_graph: ${errors.join(' ')}`);
  }

  const levels = new Map<string, Map<string, BoxId[]>>(
    Object.entries(config).map(([key, branches]) => [
      key,
      new Map(Object.entries(branches).map(([name, boxes]) => [name, [...boxes]])),
    ]),
  );

  const branchesOf = (level: number) => levels.get(levelKey(level));

  return {
    exists: (level) => levels.has(levelKey(level)),
    isForked: (level) => (branchesOf(level)?.size ?? 0) > 1,
    branchNames: (level) => [...(branchesOf(level)?.keys() ?? [])],
    boxesFor: (level, branchName) => {
      const boxes = branchesOf(level)?.get(branchName);
      return boxes ? [...boxes] : undefined;
    },
    levelCount: () => levels.size,
  };
}
