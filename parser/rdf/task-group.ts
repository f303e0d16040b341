/**
 * Join scope for extraction units.
 *
 * At most `maxConcurrency` units run at once; the rest wait in a queue. The first
 * failure wins: it aborts the group's signal and drops every queued unit, while
 * units already running are allowed to settle. wait() resolves once nothing is
 * running or queued, and rejects with the first failure if there was one.
 */

export type Task = (signal: AbortSignal) => void | Promise<void>;

export interface TaskGroup {
  /** Queues a unit. Ignored once the group has failed. */
  spawn(task: Task): void;

  /** Fails the group from outside a unit, as if a unit had thrown `reason`. */
  abort(reason: unknown): void;

  wait(): Promise<void>;

  readonly signal: AbortSignal;

  /** Units started so far. */
  readonly started: number;
}

export function createTaskGroup(maxConcurrency: number = 8): TaskGroup {
  const limit = Math.max(1, Math.floor(maxConcurrency));
  const controller = new AbortController();
  const queue: Task[] = [];
  let running = 0;
  let started = 0;
  let failed = false;
  let firstError: unknown;
  const waiters: { resolve: () => void; reject: (reason: unknown) => void }[] = [];

  function fail(reason: unknown): void {
    if (failed) return;
    failed = true;
    firstError = reason;
    queue.length = 0;
    controller.abort(reason);
  }

  function settleWaiters(): void {
    if (running > 0 || queue.length > 0) return;
    for (const waiter of waiters.splice(0)) {
      if (failed) waiter.reject(firstError);
      else waiter.resolve();
    }
  }

  async function run(task: Task): Promise<void> {
    // yield to the event loop so sibling units interleave with I/O
    await new Promise<void>(resolve => setImmediate(resolve));
    if (controller.signal.aborted) return;
    await task(controller.signal);
  }

  function pump(): void {
    while (running < limit && queue.length > 0) {
      const task = queue.shift();
      if (!task) break;
      running++;
      started++;
      run(task).then(
        () => finish(),
        (error: unknown) => {
          fail(error);
          finish();
        }
      );
    }
  }

  function finish(): void {
    running--;
    pump();
    settleWaiters();
  }

  function spawn(task: Task): void {
    if (failed) return;
    queue.push(task);
    pump();
  }

  function abort(reason: unknown): void {
    fail(reason);
    settleWaiters();
  }

  function wait(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      waiters.push({ resolve, reject });
      settleWaiters();
    });
  }

  return {
    spawn,
    abort,
    wait,
    signal: controller.signal,
    get started() {
      return started;
    }
  };
}
