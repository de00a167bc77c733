import type { LevelGraph } from '../graph/levelGraph';
import { levelKey } from '../models';
import type { EngineResult } from './results';
import { fail, succeed } from './results';

/**
 * Maps what a learner typed to the branch suffix of `level`.
 * For level 4, `a`, `4a` and `level4a` all resolve to `a`.
 * Checks run in this order: bare suffix, number + suffix, full branch name.
 */
export function resolveBranchInput(
  graph: Pick<LevelGraph, 'branchNames'>,
  level: number,
  token: string,
): EngineResult<string> {
  const names = new Set(graph.branchNames(level));
  const key = levelKey(level);

  if (names.has(`${key}${token}`)) {
    return succeed(token);
  }
  // Every branch of the level starts with `key`, so a hit here means the token
  // starts with the level number.
  if (names.has(`level${token}`)) {
    return succeed(token.slice(String(level).length));
  }
  if (names.has(token)) {
    return succeed(token.slice(key.length));
  }
  return fail('branch_not_found', `No branch called ${token} found.`);
}
