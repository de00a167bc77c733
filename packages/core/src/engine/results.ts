export type EngineErrorCode =
  | 'not_started'
  | 'already_started'
  | 'no_next_level'
  | 'branch_not_found'
  | 'unexpected_branch'
  | 'branch_unresolved'
  | 'not_eligible'
  | 'unknown_hint';

export type EngineError = {
  code: EngineErrorCode;
  message: string;
};

export type EngineResult<T> = { ok: true; value: T } | { ok: false; error: EngineError };

export function succeed<T>(value: T): EngineResult<T> {
  return { ok: true, value };
}

export function fail(code: EngineErrorCode, message: string): EngineResult<never> {
  return { ok: false, error: { code, message } };
}
