/**
 * Async Mutex
 *
 * Promise-queue lock: each caller waits for the previous holder to settle
 * before running, so critical sections execute one at a time in call order.
 *
 * @module utils/mutex
 */

export class Mutex {
  private _tail: Promise<unknown> = Promise.resolve();
  private _pending = 0;

  /** True while a critical section is running or queued */
  get locked(): boolean {
    return this._pending > 0;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    this._pending++;
    // A failed holder must not block the queue
    const run = this._tail.catch(() => undefined).then(fn);
    this._tail = run;
    try {
      return await run;
    } finally {
      this._pending--;
    }
  }
}
