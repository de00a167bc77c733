import type { BranchCandidate, KnownSkillSet, RequirementTable } from '../models';
import { levelKey } from '../models';
import type { EngineResult } from './results';
import { fail, succeed } from './results';

export function isEligible(
  candidate: BranchCandidate,
  elapsedSeconds: number,
  skills: KnownSkillSet,
): boolean {
  if (candidate.requirements === null) {
    return true;
  }
  const { timeLimit, skill } = candidate.requirements;
  return elapsedSeconds < timeLimit && skills.has(skill);
}

/**
 * Picks the branch for a forked level. Candidates are folded in listed order
 * and the last eligible one wins, so a default listed first can be overridden
 * by any later candidate whose time limit and skill the learner meets.
 */
export function selectBranch(
  candidates: BranchCandidate[],
  elapsedSeconds: number,
  skills: KnownSkillSet,
): string | null {
  if (candidates.length === 1) {
    return candidates[0].branch;
  }
  return candidates.reduce<string | null>(
    (chosen, candidate) =>
      isEligible(candidate, elapsedSeconds, skills) ? candidate.branch : chosen,
    null,
  );
}

export function selectNextBranch(
  table: RequirementTable,
  currentLevel: number,
  elapsedSeconds: number,
  skills: KnownSkillSet,
): EngineResult<string> {
  const key = levelKey(currentLevel + 1);
  const candidates = Object.hasOwn(table, key) ? table[key] : [];
  if (candidates.length === 0) {
    return fail('branch_unresolved', `No branch requirements listed for ${key}.`);
  }
  const branch = selectBranch(candidates, elapsedSeconds, skills);
  if (branch === null) {
    return fail('branch_unresolved', `No branch of ${key} is open to this learner.`);
  }
  return succeed(branch);
}

export function createSkillSet(skills: Iterable<string> = []): Set<string> {
  return new Set(skills);
}

/** Returns false when the skill was already known. */
export function addKnownSkill(skills: Set<string>, skill: string): boolean {
  if (skills.has(skill)) {
    return false;
  }
  skills.add(skill);
  return true;
}
