/**
 * Ordered-field operations over the amount type a pool counts in.
 *
 * Pools never touch amounts directly; every add, subtract and comparison
 * goes through one of these. Use `bigintArithmetic` (in scaled units) or your
 * own decimal implementation when bound accounting has to be exact.
 *
 * @example
 * ```ts
 * // amounts in thousandths of a unit
 * const pool = new ResourcePool(2_500n, bigintArithmetic)
 * ```
 */
export interface Arithmetic<T> {
  readonly zero: T
  add(a: T, b: T): T
  subtract(a: T, b: T): T
  /** Negative when `a < b`, zero when equal, positive when `a > b`. */
  compare(a: T, b: T): number
  isZero(a: T): boolean
}

export const numberArithmetic: Arithmetic<number> = {
  zero: 0,
  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  isZero: (a) => a === 0,
}

export const bigintArithmetic: Arithmetic<bigint> = {
  zero: 0n,
  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  isZero: (a) => a === 0n,
}

export function min<T>(arithmetic: Arithmetic<T>, a: T, b: T): T {
  return arithmetic.compare(a, b) <= 0 ? a : b
}

export function max<T>(arithmetic: Arithmetic<T>, a: T, b: T): T {
  return arithmetic.compare(a, b) >= 0 ? a : b
}

export function isPositive<T>(arithmetic: Arithmetic<T>, a: T): boolean {
  return arithmetic.compare(a, arithmetic.zero) > 0
}

export function isNegative<T>(arithmetic: Arithmetic<T>, a: T): boolean {
  return arithmetic.compare(a, arithmetic.zero) < 0
}
