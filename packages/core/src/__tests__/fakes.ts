import { vi } from 'vitest';

export const CLOCK_START = Date.UTC(2025, 0, 1, 10, 0, 0);

export function createManualClock(start = CLOCK_START) {
  let current = start;
  return {
    now: () => current,
    advance: (seconds: number) => {
      current += seconds * 1000;
    },
  };
}

export function createFakeProvisioner(loadTime = 30) {
  return {
    bringUp: vi.fn(async (_boxes: string[], _tag: string) => loadTime),
    tearDown: vi.fn(async () => undefined),
  };
}
