import type { BoxId } from '../models';
import type { EngineErrorCode } from './results';

export type TraceGate = 'start' | 'advance' | 'finish' | 'abort' | 'flag';

export type TraceMeta = {
  level?: number;
  branch?: string;
  /** Full level name, e.g. `level4b`, of the level just provisioned. */
  levelName?: string;
  boxes?: BoxId[];
  /** Seconds, as reported by the provisioner. */
  loadTime?: number;
  totalElapsed?: number;
};

export type TraceEvent = {
  gate: TraceGate;
  outcome: 'ok' | 'rejected';
  code?: EngineErrorCode;
  meta?: TraceMeta;
  /** ISO timestamp taken from the engine clock. */
  at: string;
};

export function pushTrace(
  trace: TraceEvent[] | undefined,
  event: Omit<TraceEvent, 'at'>,
  now: () => number,
): void {
  if (!trace) return;
  trace.push({ ...event, at: new Date(now()).toISOString() });
}
