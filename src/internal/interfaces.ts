export type AcquireOptions = {
  /** Aborting rejects a pending acquire with the signal's reason. */
  signal?: AbortSignal;
};

export type ShrinkState<T> = { readonly kind: 'stable' } | { readonly kind: 'pendingShrink'; readonly amount: T };

export type BoundUpdate<T> = {
  fullyApplied: boolean;
  /** Decrement still waiting to be absorbed by future releases. */
  remaining: T;
};

export type PoolMetrics<T> = {
  available: T;
  waiting: number;
  bound?: T; // Bounded only
  leased?: T; // Bounded only
  pendingDecrement?: T; // Bounded only
};

/** Anything that hands out and takes back amounts. */
export interface Leasable<T> {
  acquire(amount: T, options?: AcquireOptions): Promise<true>;
  release(amount: T): void;
}

export interface IResourcePool<T> extends Leasable<T> {
  readonly value: T;
  tryAcquire(amount: T): boolean;
  locked(): boolean;
  lockedForValue(amount: T): boolean;
  use<R>(amount: T, fn: (amount: T) => R | Promise<R>, options?: AcquireOptions): Promise<R>;
  getMetrics(): PoolMetrics<T>;
}
