/**
 * Bounded-concurrency task runner.
 *
 * Runs async tasks with at most `limit` in flight and collects every outcome
 * in task order. Rejections are captured per task rather than thrown.
 */

export type TaskOutcome<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; error: Error };

export interface ConcurrencyResult<T> {
  results: Array<TaskOutcome<T>>;
  /** True when failFast stopped the pool before every task started */
  aborted: boolean;
}

export interface ConcurrencyOptions {
  /** Stop starting new tasks after the first rejection (default: false) */
  failFast?: boolean;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

export async function runWithConcurrency<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  limit: number,
  options: ConcurrencyOptions = {}
): Promise<ConcurrencyResult<T>> {
  const { failFast = false } = options;
  const width = Math.max(1, Math.min(Math.floor(limit) || 1, tasks.length));
  const results: Array<TaskOutcome<T> | undefined> = new Array(tasks.length);
  let next = 0;
  let aborted = false;

  const worker = async (): Promise<void> => {
    while (next < tasks.length && !aborted) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await tasks[index]() };
      } catch (reason) {
        results[index] = { status: 'rejected', error: toError(reason) };
        if (failFast) {
          aborted = true;
        }
      }
    }
  };

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < width && tasks.length > 0; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return {
    results: results.filter((entry): entry is TaskOutcome<T> => entry !== undefined),
    aborted
  };
}
