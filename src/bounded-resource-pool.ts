import { isNegative, max, min, type Arithmetic } from './arithmetic';
import { InvalidValueError, OverReleaseError, PrecisionError } from './internal/errors';
import type { BoundUpdate, PoolMetrics, ShrinkState } from './internal/interfaces';
import { ResourcePool } from './resource-pool';

const STABLE = Object.freeze({ kind: 'stable' } as const);

function pendingShrink<T>(amount: T): ShrinkState<T> {
  return Object.freeze({ kind: 'pendingShrink' as const, amount });
}

/**
 * A ResourcePool that refuses to be released past its bound, and whose bound
 * can be moved while leases are out.
 *
 * Raising the bound makes the difference available immediately. Lowering it
 * reclaims what is free now and defers the rest: later releases are absorbed
 * into the deferred decrement instead of being handed out again.
 *
 * Releasing without holding a lease while a shrink is pending eats into the
 * deferred decrement, and the resulting OverReleaseError then surfaces at a
 * legitimate holder's release instead of the offending one.
 *
 * With `number` amounts, float drift can leave a sliver of a deferred
 * decrement that never reaches zero; use `bigintArithmetic` in scaled units
 * (or an exact decimal arithmetic) when shrinking matters.
 */
export class BoundedResourcePool<T> extends ResourcePool<T> {
  private boundValue: T;
  private shrink: ShrinkState<T> = STABLE;

  constructor(value: T, arithmetic: Arithmetic<T>, bound: T = value) {
    super(value, arithmetic);
    if (isNegative(arithmetic, bound)) {
      throw new InvalidValueError('bound must be >= 0', { bound });
    }
    if (arithmetic.compare(value, bound) > 0) {
      throw new InvalidValueError('initial value cannot exceed bound', { value, bound });
    }
    this.boundValue = bound;
  }

  public get bound(): T {
    return this.boundValue;
  }

  public get shrinkState(): ShrinkState<T> {
    return this.shrink;
  }

  /**
   * @throws OverReleaseError when the pool is already back at its bound
   */
  public override release(amount: T): void {
    this.assertAmount(amount);
    const arithmetic = this.arithmetic;

    if (this.shrink.kind === 'pendingShrink') {
      const absorbed = min(arithmetic, amount, this.shrink.amount);
      const remaining = arithmetic.subtract(this.shrink.amount, absorbed);
      this.pool.debit(absorbed);
      this.shrink = arithmetic.isZero(remaining) ? STABLE : pendingShrink(remaining);
    }

    if (arithmetic.compare(this.pool.value, this.boundValue) >= 0) {
      throw new OverReleaseError({ amount, value: this.pool.value, bound: this.boundValue });
    }

    this.pool.credit(amount);
    this.pool.wakeUpNext();
  }

  /**
   * Move the bound to `newBound`.
   *
   * Lowering the bound below what is currently leased cannot take effect
   * at once; the shortfall is reported as `remaining` and absorbed by the
   * next releases.
   */
  public updateBoundValue(newBound: T): BoundUpdate<T> {
    const arithmetic = this.arithmetic;
    if (isNegative(arithmetic, newBound)) {
      throw new InvalidValueError('bound must be >= 0', { bound: newBound });
    }

    const applied: BoundUpdate<T> = { fullyApplied: true, remaining: arithmetic.zero };
    const order = arithmetic.compare(newBound, this.boundValue);

    if (order === 0) {
      this.shrink = STABLE;
      return applied;
    }

    if (order > 0) {
      const diff = arithmetic.subtract(newBound, this.boundValue);
      this.boundValue = newBound;
      this.pool.credit(diff);
      this.shrink = STABLE;
      this.pool.wakeUpAll();
      return applied;
    }

    const leased = arithmetic.subtract(this.boundValue, this.pool.value);
    const reclaimable = max(arithmetic, arithmetic.zero, arithmetic.subtract(this.boundValue, leased));
    const want = arithmetic.subtract(this.boundValue, newBound);
    const take = min(arithmetic, want, reclaimable);
    const deficit = arithmetic.subtract(want, take);

    if (isNegative(arithmetic, deficit)) {
      throw new PrecisionError({ bound: this.boundValue, newBound, value: this.pool.value, deficit });
    }

    this.pool.debit(take);
    this.boundValue = newBound;

    if (arithmetic.isZero(deficit)) {
      this.shrink = STABLE;
      return applied;
    }

    this.shrink = pendingShrink(deficit);
    return { fullyApplied: false, remaining: deficit };
  }

  public override getMetrics(): PoolMetrics<T> {
    return {
      ...super.getMetrics(),
      bound: this.boundValue,
      leased: this.arithmetic.subtract(this.boundValue, this.pool.value),
      pendingDecrement: this.shrink.kind === 'pendingShrink' ? this.shrink.amount : this.arithmetic.zero,
    };
  }
}
