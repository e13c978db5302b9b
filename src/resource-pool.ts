import { isNegative, isPositive, type Arithmetic } from './arithmetic';
import { abortReason, BasePool } from './internal/base-pool';
import { InvalidValueError } from './internal/errors';
import type { AcquireOptions, IResourcePool, PoolMetrics } from './internal/interfaces';
import { ScopedAcquisition } from './scoped-acquisition';

/**
 * ResourcePool - a weighted semaphore over an arbitrary numeric amount.
 *
 * Callers acquire and release any positive amount. A request that fits in
 * what is currently available is granted at once, even if larger requests
 * are queued; requests that had to wait are woken strictly in arrival order.
 *
 * Example:
 * ```typescript
 * const bandwidth = new ResourcePool(10, numberArithmetic);
 * await bandwidth.use(2.5, () => transfer(file));
 * ```
 */
export class ResourcePool<T> implements IResourcePool<T> {
  protected pool: BasePool<T>;
  protected arithmetic: Arithmetic<T>;

  constructor(value: T, arithmetic: Arithmetic<T>) {
    if (isNegative(arithmetic, value)) {
      throw new InvalidValueError('initial value must be >= 0', { value });
    }
    this.arithmetic = arithmetic;
    this.pool = new BasePool(value, arithmetic);
  }

  /**
   * Amount currently available
   */
  public get value(): T {
    return this.pool.value;
  }

  /**
   * Number of blocked acquires still waiting for a grant
   */
  public get waiting(): number {
    return this.pool.pendingCount();
  }

  /**
   * Acquire `amount`, waiting in line if it is not available yet.
   * @param options - `signal` cancels a pending acquire
   * @returns `true` once the amount is held
   * @throws the signal's abort reason if cancelled before the grant was taken
   */
  public async acquire(amount: T, options: AcquireOptions = {}): Promise<true> {
    this.assertAmount(amount);
    const { signal } = options;
    if (signal?.aborted) throw abortReason(signal);

    if (this.pool.tryTake(amount)) return true;

    await this.pool.wait(amount, signal);
    return true;
  }

  /**
   * Synchronously acquire `amount` if it is available right now
   * @returns false when it would have to wait; nothing is queued
   */
  public tryAcquire(amount: T): boolean {
    this.assertAmount(amount);
    return this.pool.tryTake(amount);
  }

  /**
   * Return `amount` to the pool and wake at most one waiter
   */
  public release(amount: T): void {
    this.assertAmount(amount);
    this.pool.credit(amount);
    this.pool.wakeUpNext();
  }

  /**
   * Advisory: true when nothing is available, or when a queued waiter
   * already fits and should go first. `acquire` does not consult this.
   */
  public locked(): boolean {
    return this.arithmetic.isZero(this.pool.value) || this.pool.hasEligibleWaiter();
  }

  public lockedForValue(amount: T): boolean {
    return this.arithmetic.compare(this.pool.value, amount) < 0 || this.pool.hasEligibleWaiter();
  }

  public scoped(amount: T, options?: AcquireOptions): ScopedAcquisition<T> {
    return new ScopedAcquisition(this, amount, options);
  }

  /**
   * Run `fn` while holding `amount`, releasing it afterwards even if `fn` throws
   */
  public async use<R>(amount: T, fn: (amount: T) => R | Promise<R>, options?: AcquireOptions): Promise<R> {
    return this.scoped(amount, options).run(fn);
  }

  public getMetrics(): PoolMetrics<T> {
    return {
      available: this.pool.value,
      waiting: this.pool.pendingCount(),
    };
  }

  public toString(): string {
    let extra = this.locked() ? 'locked' : `unlocked, value: ${String(this.pool.value)}`;
    const queued = this.pool.queueLength();
    if (queued > 0) extra = `${extra}, waiters: ${queued}`;
    return `${this.constructor.name} [${extra}]`;
  }

  protected assertAmount(amount: T): void {
    if (!isPositive(this.arithmetic, amount)) {
      throw new InvalidValueError('amount must be > 0', { amount });
    }
  }
}
