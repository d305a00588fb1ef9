import { isApiError, type ApiFailureKind } from '../api/errors.js';
import { describeError } from '../logging.js';
import type { Sleeper } from './sleep.js';

export type AttemptOutcome<T> = { kind: 'ok'; value: T } | { kind: 'failed'; error: unknown };

export type FailureAction = 'rotate' | 'backoff_then_retry';

/** What a credential loop does after a failed attempt, by failure kind. */
export const FAILURE_POLICY: Readonly<Record<ApiFailureKind, FailureAction>> = {
  rate_limited: 'backoff_then_retry',
  permission: 'rotate',
  credential: 'rotate',
  transient: 'rotate',
  malformed: 'rotate',
  request: 'rotate',
};

export const actionFor = (error: unknown): FailureAction =>
  isApiError(error) ? FAILURE_POLICY[error.kind] : 'rotate';

export const attempt = async <T>(operation: () => Promise<T>): Promise<AttemptOutcome<T>> => {
  try {
    return { kind: 'ok', value: await operation() };
  } catch (error) {
    return { kind: 'failed', error };
  }
};

export interface BackoffOptions {
  sleep: Sleeper;
  backoffMs: number;
  signal?: AbortSignal;
  onBackoff?: (error: unknown) => void;
}

/**
 * Runs one attempt; when the policy says so, waits the backoff and retries
 * exactly once with the same credential. Aborting the signal rejects from the sleep.
 */
export const attemptWithBackoff = async <T>(
  operation: () => Promise<T>,
  options: BackoffOptions
): Promise<AttemptOutcome<T>> => {
  const first = await attempt(operation);
  if (first.kind === 'ok' || actionFor(first.error) !== 'backoff_then_retry') {
    return first;
  }
  options.onBackoff?.(first.error);
  await options.sleep(options.backoffMs, options.signal);
  return attempt(operation);
};

export const failureReason = (alias: string, error: unknown): string => {
  if (isApiError(error)) return `${error.message} (key '${alias}')`;
  return `Unexpected error with key '${alias}': ${describeError(error)}`;
};
