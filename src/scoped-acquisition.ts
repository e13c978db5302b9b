import { ScopeUsageError } from './internal/errors';
import type { AcquireOptions, Leasable } from './internal/interfaces';

type ScopeState = 'idle' | 'acquiring' | 'held' | 'spent';

/**
 * One acquire paired with exactly one release.
 *
 * A token is good for a single enter/exit cycle. Entering twice, exiting
 * before entering, or exiting twice throws {@link ScopeUsageError}.
 *
 * @example
 * ```ts
 * const lease = pool.scoped(2.5)
 * await lease.enter()
 * try {
 *   await upload()
 * } finally {
 *   lease.exit()
 * }
 * ```
 */
export class ScopedAcquisition<T> {
  private state: ScopeState = 'idle';
  private pool: Leasable<T>;
  private signal?: AbortSignal;
  public readonly amount: T;

  constructor(pool: Leasable<T>, amount: T, options: AcquireOptions = {}) {
    this.pool = pool;
    this.amount = amount;
    this.signal = options.signal;
  }

  public get held(): boolean {
    return this.state === 'held';
  }

  public get spent(): boolean {
    return this.state === 'spent';
  }

  public async enter(): Promise<this> {
    if (this.state !== 'idle') {
      throw new ScopeUsageError(`cannot enter a scoped acquisition that is ${this.state}`);
    }

    this.state = 'acquiring';
    try {
      await this.pool.acquire(this.amount, { signal: this.signal });
    } catch (error) {
      // Nothing was acquired, so there is nothing to release.
      this.state = 'spent';
      throw error;
    }
    this.state = 'held';
    return this;
  }

  public exit(): void {
    if (this.state !== 'held') {
      throw new ScopeUsageError(`cannot exit a scoped acquisition that is ${this.state}`);
    }
    this.state = 'spent';
    this.pool.release(this.amount);
  }

  /**
   * Enter, run `fn`, exit. The release happens whether `fn` returns or throws.
   */
  public async run<R>(fn: (amount: T) => R | Promise<R>): Promise<R> {
    await this.enter();
    try {
      return await fn(this.amount);
    } finally {
      this.exit();
    }
  }
}
