import { test } from 'node:test';
import assert from 'node:assert';
import {
  BoundedResourcePool,
  createBoundedResourcePool,
  createResourcePool,
  InvalidValueError,
  ResourcePool,
  type Arithmetic,
} from '../../src/index';

test('createResourcePool - number amounts', async () => {
  const pool = createResourcePool({ value: 3 });

  assert(pool instanceof ResourcePool);
  assert.equal(pool.value, 3);
  await pool.acquire(0.5);
  assert.equal(pool.value, 2.5);
});

test('createResourcePool - bigint amounts', async () => {
  const pool = createResourcePool({ value: 10n });

  await pool.acquire(4n);
  assert.equal(pool.value, 6n);
  pool.release(4n);
  assert.equal(pool.value, 10n);
});

test('createResourcePool - explicit arithmetic', async () => {
  // amounts as decimal strings with two fraction digits
  const cents: Arithmetic<string> = {
    zero: '0.00',
    add: (a, b) => format(parse(a) + parse(b)),
    subtract: (a, b) => format(parse(a) - parse(b)),
    compare: (a, b) => Number(parse(a) - parse(b)),
    isZero: (a) => parse(a) === 0n,
  };
  function parse(amount: string): bigint {
    const [whole, fraction = ''] = amount.split('.');
    const sign = whole.startsWith('-') ? -1n : 1n;
    return sign * (BigInt(whole.replace('-', '')) * 100n + BigInt(fraction.padEnd(2, '0')));
  }
  function format(units: bigint): string {
    const sign = units < 0n ? '-' : '';
    const abs = units < 0n ? -units : units;
    return `${sign}${abs / 100n}.${(abs % 100n).toString().padStart(2, '0')}`;
  }

  const pool = createResourcePool({ value: '3.50', arithmetic: cents });
  await pool.acquire('1.25');
  assert.equal(pool.value, '2.25');
  assert.equal(pool.tryAcquire('2.30'), false);
  pool.release('1.25');
  assert.equal(pool.value, '3.50');
});

test('createResourcePool - validation', () => {
  assert.throws(() => createResourcePool({ value: -0.1 }), InvalidValueError);
  assert.throws(() => createResourcePool({ value: -1n }), InvalidValueError);
  assert.throws(() => createResourcePool({ value: Number.NaN }), {
    name: 'InvalidValueError',
    message: 'value must be a number',
  });
});

test('createBoundedResourcePool - bound defaults to value', () => {
  const pool = createBoundedResourcePool({ value: 4 });

  assert(pool instanceof BoundedResourcePool);
  assert.equal(pool.bound, 4);
  assert.equal(pool.value, 4);
});

test('createBoundedResourcePool - explicit bound leaves the difference leased', () => {
  const pool = createBoundedResourcePool({ value: 2, bound: 5 });

  assert.equal(pool.bound, 5);
  assert.equal(pool.getMetrics().leased, 3);
  pool.release(3);
  assert.equal(pool.value, 5);
});

test('createBoundedResourcePool - bigint amounts', () => {
  const pool = createBoundedResourcePool({ value: 1n, bound: 3n });

  assert.equal(pool.bound, 3n);
  // 2n is leased, so only the 1n that is free can be reclaimed now
  assert.deepStrictEqual(pool.updateBoundValue(1n), { fullyApplied: false, remaining: 1n });
  assert.equal(pool.value, 0n);
  assert.equal(pool.bound, 1n);
});

test('createBoundedResourcePool - validation', () => {
  assert.throws(() => createBoundedResourcePool({ value: 3, bound: 2 }), {
    name: 'InvalidValueError',
    message: 'initial value cannot exceed bound',
  });
  assert.throws(() => createBoundedResourcePool({ value: 0, bound: -2 }), InvalidValueError);
  assert.throws(() => createBoundedResourcePool({ value: 1, bound: Number.NaN }), {
    name: 'InvalidValueError',
    message: 'value and bound must be numbers',
  });
});
