import { setImmediate as nextTurn } from 'node:timers/promises';

/**
 * Single-worker task queue. Tasks run one at a time in enqueue order,
 * each starting on a later event-loop turn than the call that queued it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  enqueue<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      await nextTurn();
      return task();
    });

    // A failed task settles its own promise only; the chain keeps going
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
