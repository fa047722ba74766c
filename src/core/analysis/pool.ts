export type TaskOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; error: unknown }
  | { status: 'skipped' };

export interface PoolOptions {
  concurrency: number;
  /** Absolute time (ms since epoch) after which no task is started or awaited. */
  deadline?: number;
}

export interface PoolResult<R> {
  outcomes: Array<TaskOutcome<R>>;
  deadlineExceeded: boolean;
}

/**
 * Run `worker` over `items` with at most `concurrency` tasks in flight.
 * When the deadline passes, tasks that have not settled are reported as skipped;
 * results that already settled are kept.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<PoolResult<R>> {
  const outcomes: Array<TaskOutcome<R>> = items.map(() => ({ status: 'skipped' }));
  const limit = Math.max(1, options.concurrency);
  let next = 0;
  let expired = false;
  const active = new Set<Promise<void>>();

  let onExpire: () => void = () => undefined;
  const deadline =
    options.deadline === undefined
      ? null
      : new Promise<void>((resolve) => {
          onExpire = resolve;
        });
  const timer =
    options.deadline === undefined
      ? null
      : setTimeout(() => {
          expired = true;
          onExpire();
        }, Math.max(0, options.deadline - Date.now()));

  const scheduleNext = (): void => {
    while (!expired && active.size < limit && next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      const task: Promise<void> = worker(item, index)
        .then(
          (value) => {
            if (!expired) outcomes[index] = { status: 'fulfilled', value };
          },
          (error: unknown) => {
            if (!expired) outcomes[index] = { status: 'rejected', error };
          },
        )
        .then(() => {
          active.delete(task);
        });
      active.add(task);
    }
  };

  try {
    scheduleNext();
    while (active.size > 0 && !expired) {
      await Promise.race(deadline ? [...active, deadline] : active);
      scheduleNext();
    }
  } finally {
    if (timer) clearTimeout(timer);
  }

  return { outcomes, deadlineExceeded: expired && outcomes.some((o) => o.status === 'skipped') };
}

export type Timed<T> = { status: 'done'; value: T } | { status: 'timeout' };

/** Wait for `task` until `deadline`. A rejection of the task still propagates. */
export async function beforeDeadline<T>(task: Promise<T>, deadline: number | undefined): Promise<Timed<T>> {
  if (deadline === undefined) return { status: 'done', value: await task };
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<Timed<T>>((resolve) => {
    timer = setTimeout(() => resolve({ status: 'timeout' }), Math.max(0, deadline - Date.now()));
  });
  try {
    return await Promise.race([task.then((value): Timed<T> => ({ status: 'done', value })), expired]);
  } finally {
    clearTimeout(timer);
  }
}
