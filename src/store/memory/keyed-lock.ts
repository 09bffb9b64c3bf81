import { ConcurrentModificationError } from '../../core/errors/subscription.errors';

export type LockRelease = () => void;

const settlesWithin = (
  promise: Promise<void>,
  timeoutMs: number,
): Promise<boolean> =>
  new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    const settle = () => {
      clearTimeout(timer);
      resolve(true);
    };
    promise.then(settle, settle);
  });

/**
 * FIFO exclusive lock per key with a bounded wait, the in-process equivalent
 * of `SELECT ... FOR UPDATE` under `lock_timeout`
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string, timeoutMs: number): Promise<LockRelease> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseHeld: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      releaseHeld = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    const acquired = await settlesWithin(previous, timeoutMs);
    if (!acquired) {
      // our slot still waits for `previous`, so later waiters stay ordered
      releaseHeld();
      throw new ConcurrentModificationError(
        `Timed out after ${timeoutMs}ms waiting for lock ${key}`,
      );
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      releaseHeld();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
