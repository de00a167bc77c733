import type { FlagRegistry, WrongFlagLog } from '../models';
import { levelKey } from '../models';

export type FlagValidator = {
  check(level: number, submitted: string): boolean;
  wrongGuesses(level: number): string[];
  snapshot(): WrongFlagLog;
};

export function createFlagValidator(flags: FlagRegistry, wrong: WrongFlagLog = {}): FlagValidator {
  const expected = new Map(Object.entries(flags));
  const wrongByLevel = new Map<string, string[]>(
    Object.entries(wrong).map(([key, guesses]) => [key, [...guesses]]),
  );

  return {
    check: (level, submitted) => {
      const key = levelKey(level);
      // Levels without a registered flag reject every submission.
      if (expected.get(key) === submitted) {
        return true;
      }
      wrongByLevel.set(key, [...(wrongByLevel.get(key) ?? []), submitted]);
      return false;
    },
    wrongGuesses: (level) => [...(wrongByLevel.get(levelKey(level)) ?? [])],
    snapshot: () =>
      Object.fromEntries([...wrongByLevel].map(([key, guesses]) => [key, [...guesses]])),
  };
}
