import { ok, err, type Result, withTimeout, tryCatchAsync, toError, isTimeoutError } from '@mailpilot/utils';

export interface CallFailure {
  message: string;
  timedOut: boolean;
  // Error code reported by the collaborator, when it returned one
  providerCode?: string;
}

/**
 * Await a collaborator call under a deadline and fold a timeout, a thrown
 * error and an `err` result into one failure shape.
 */
export async function callWithTimeout<T>(
  fn: () => Promise<Result<T, { code: string; message: string }>>,
  timeoutMs: number,
  operation: string
): Promise<Result<T, CallFailure>> {
  const outcome = await tryCatchAsync(() => withTimeout(fn, timeoutMs, operation), toError);
  if (!outcome.ok) {
    return err({ message: outcome.error.message, timedOut: isTimeoutError(outcome.error) });
  }

  const result = outcome.value;
  if (!result.ok) {
    return err({ message: result.error.message, timedOut: false, providerCode: result.error.code });
  }
  return ok(result.value);
}
