/**
 * Ordered provider attempts.
 *
 * Each attempt reports success, a retryable failure (optionally carrying one
 * follow-up attempt) or a fatal failure. attemptInOrder runs them top-down
 * and stops at the first success. A follow-up runs exactly once and is not
 * itself retried, whatever it reports.
 */

export type AttemptOutcome<T> =
  | { status: "success"; value: T }
  | { status: "retryable"; error: Error; retry?: ProviderAttempt<T> }
  | { status: "fatal"; error: Error };

export type ProviderAttempt<T> = {
  provider: string;
  run: () => Promise<AttemptOutcome<T>>;
};

export type AttemptFailure = {
  provider: string;
  error: Error;
};

export type AttemptResult<T> = {
  value: T;
  provider: string;
  /** Providers that were tried, in order, including the one that succeeded */
  attempted: string[];
  failures: AttemptFailure[];
};

export class AllAttemptsFailedError extends Error {
  constructor(public readonly failures: AttemptFailure[]) {
    const last = failures[failures.length - 1];
    super(last ? last.error.message : "No provider attempts were given");
    this.name = "AllAttemptsFailedError";
  }
}

async function runAttempt<T>(attempt: ProviderAttempt<T>): Promise<AttemptOutcome<T>> {
  try {
    return await attempt.run();
  } catch (err) {
    return { status: "fatal", error: err instanceof Error ? err : new Error(String(err)) };
  }
}

export async function attemptInOrder<T>(attempts: ReadonlyArray<ProviderAttempt<T>>): Promise<AttemptResult<T>> {
  const attempted: string[] = [];
  const failures: AttemptFailure[] = [];

  for (const attempt of attempts) {
    attempted.push(attempt.provider);
    const outcome = await runAttempt(attempt);
    if (outcome.status === "success") {
      return { value: outcome.value, provider: attempt.provider, attempted, failures };
    }
    failures.push({ provider: attempt.provider, error: outcome.error });

    if (outcome.status === "retryable" && outcome.retry) {
      const retry = outcome.retry;
      attempted.push(retry.provider);
      const retried = await runAttempt(retry);
      if (retried.status === "success") {
        return { value: retried.value, provider: retry.provider, attempted, failures };
      }
      failures.push({ provider: retry.provider, error: retried.error });
    }
  }

  const last = failures[failures.length - 1];
  if (last) {
    throw last.error;
  }
  throw new AllAttemptsFailedError(failures);
}
