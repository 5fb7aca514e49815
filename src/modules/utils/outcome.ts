export type FailureReason = 'not_found' | 'unavailable';

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: FailureReason; message: string };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T>(reason: FailureReason, message: string): Outcome<T> {
  return { ok: false, reason, message };
}
