import { bigintArithmetic, numberArithmetic, type Arithmetic } from './arithmetic';
import { BoundedResourcePool } from './bounded-resource-pool';
import { InvalidValueError } from './internal/errors';
import { ResourcePool } from './resource-pool';

export { ResourcePool, BoundedResourcePool };
export { ScopedAcquisition } from './scoped-acquisition';
export { bigintArithmetic, numberArithmetic, type Arithmetic } from './arithmetic';
export {
  InvalidValueError,
  OverReleaseError,
  PrecisionError,
  ResourcePoolError,
  ScopeUsageError,
  type ResourcePoolErrorCode,
} from './internal/errors';
export type {
  AcquireOptions,
  BoundUpdate,
  IResourcePool,
  Leasable,
  PoolMetrics,
  ShrinkState,
} from './internal/interfaces';

/**
 * Create a pool counting in plain numbers.
 *
 * @example
 * ```ts
 * const pool = createResourcePool({ value: 3.5 });
 * await pool.acquire(2);
 * pool.release(2);
 * ```
 */
export function createResourcePool(config: { value: number }): ResourcePool<number>;

/**
 * Create a pool counting in bigints. Exact; scale your units as needed.
 */
export function createResourcePool(config: { value: bigint }): ResourcePool<bigint>;

/**
 * Create a pool over any amount type, given its arithmetic.
 *
 * @template T - The amount type
 */
export function createResourcePool<T>(config: { value: T; arithmetic: Arithmetic<T> }): ResourcePool<T>;

// Implementation
export function createResourcePool<T>(
  config: { value: number } | { value: bigint } | { value: T; arithmetic: Arithmetic<T> },
): ResourcePool<number> | ResourcePool<bigint> | ResourcePool<T> {
  if (!config) {
    throw new Error('Pool configuration is required');
  }

  if ('arithmetic' in config) {
    return new ResourcePool(config.value, config.arithmetic);
  }

  if (typeof config.value === 'number') {
    // Rule: NaN would compare false against everything and never drain
    if (Number.isNaN(config.value)) {
      throw new InvalidValueError('value must be a number', { value: config.value });
    }
    return new ResourcePool(config.value, numberArithmetic);
  }

  if (typeof config.value === 'bigint') {
    return new ResourcePool(config.value, bigintArithmetic);
  }

  throw new Error('arithmetic is required for values that are not number or bigint');
}

/**
 * Create a bounded pool counting in plain numbers.
 * `bound` defaults to `value`.
 *
 * @example
 * ```ts
 * const pool = createBoundedResourcePool({ value: 20 });
 * pool.updateBoundValue(5); // { fullyApplied: true, remaining: 0 }
 * ```
 */
export function createBoundedResourcePool(config: { value: number; bound?: number }): BoundedResourcePool<number>;

export function createBoundedResourcePool(config: { value: bigint; bound?: bigint }): BoundedResourcePool<bigint>;

export function createBoundedResourcePool<T>(config: {
  value: T;
  bound?: T;
  arithmetic: Arithmetic<T>;
}): BoundedResourcePool<T>;

// Implementation
export function createBoundedResourcePool<T>(
  config:
    | { value: number; bound?: number }
    | { value: bigint; bound?: bigint }
    | { value: T; bound?: T; arithmetic: Arithmetic<T> },
): BoundedResourcePool<number> | BoundedResourcePool<bigint> | BoundedResourcePool<T> {
  if (!config) {
    throw new Error('Pool configuration is required');
  }

  if ('arithmetic' in config) {
    return new BoundedResourcePool(config.value, config.arithmetic, config.bound ?? config.value);
  }

  // Rule: value and bound must be the same kind of number
  if (typeof config.value === 'number' && (config.bound === undefined || typeof config.bound === 'number')) {
    if (Number.isNaN(config.value) || (config.bound !== undefined && Number.isNaN(config.bound))) {
      throw new InvalidValueError('value and bound must be numbers', { value: config.value, bound: config.bound });
    }
    return new BoundedResourcePool(config.value, numberArithmetic, config.bound ?? config.value);
  }

  if (typeof config.value === 'bigint' && (config.bound === undefined || typeof config.bound === 'bigint')) {
    return new BoundedResourcePool(config.value, bigintArithmetic, config.bound ?? config.value);
  }

  throw new Error('value and bound must both be numbers or both be bigints, or an arithmetic must be given');
}
