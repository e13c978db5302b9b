import { isPositive, type Arithmetic } from '../arithmetic'

// pending -> granted (waker subtracted the amount) | cancelled (abort listener)
type WaiterState = 'pending' | 'granted' | 'cancelled'

type WakeOutcome = 'granted' | 'cancelled'

interface Waiter<T> {
  amount: T
  state: WaiterState
  settle: (outcome: WakeOutcome) => void
}

export function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Acquire aborted')
}

/**
 * Counter plus FIFO wait queue shared by every pool flavour.
 *
 * All methods are synchronous except `wait`, which is the only place a
 * caller can be suspended. Between two awaits nothing else mutates the pool,
 * so no locking is needed.
 */
export class BasePool<T> {
  private current: T
  private waiters: Waiter<T>[] = []
  readonly arithmetic: Arithmetic<T>

  constructor(value: T, arithmetic: Arithmetic<T>) {
    this.current = value
    this.arithmetic = arithmetic
  }

  public get value(): T {
    return this.current
  }

  /** Waiters still waiting for a grant. */
  public pendingCount(): number {
    let count = 0
    for (const waiter of this.waiters) {
      if (waiter.state === 'pending') count++
    }
    return count
  }

  /** Records in the queue, including granted or cancelled ones not yet resumed. */
  public queueLength(): number {
    return this.waiters.length
  }

  public credit(amount: T): void {
    this.current = this.arithmetic.add(this.current, amount)
  }

  /** May leave the counter negative; callers restore it before returning. */
  public debit(amount: T): void {
    this.current = this.arithmetic.subtract(this.current, amount)
  }

  /**
   * Fast path. Does not look at the queue: a request that fits now goes
   * ahead of larger queued ones.
   */
  public tryTake(amount: T): boolean {
    if (this.arithmetic.compare(this.current, amount) < 0) return false
    this.debit(amount)
    return true
  }

  /**
   * Grant the first pending waiter whose amount fits.
   * @returns whether anyone was woken
   */
  public wakeUpNext(): boolean {
    for (const waiter of this.waiters) {
      if (waiter.state === 'pending' && this.arithmetic.compare(this.current, waiter.amount) >= 0) {
        this.debit(waiter.amount)
        waiter.state = 'granted'
        waiter.settle('granted')
        return true
      }
    }
    return false
  }

  public wakeUpAll(): void {
    while (isPositive(this.arithmetic, this.current)) {
      if (!this.wakeUpNext()) break
    }
  }

  /** Is there a live waiter that the current value already covers? */
  public hasEligibleWaiter(): boolean {
    return this.waiters.some(
      (waiter) => waiter.state !== 'cancelled' && this.arithmetic.compare(this.current, waiter.amount) >= 0,
    )
  }

  /**
   * Queue up for `amount` and suspend until granted or aborted.
   *
   * By the time this resolves the amount has been subtracted on our behalf.
   * If the signal fires after the grant but before we resumed, the grant is
   * handed back and the abort reason is thrown anyway.
   */
  public async wait(amount: T, signal?: AbortSignal): Promise<void> {
    const waiter: Waiter<T> = { amount, state: 'pending', settle: () => {} }
    const woken = new Promise<WakeOutcome>((resolve) => {
      waiter.settle = resolve
    })
    const onAbort = () => {
      if (waiter.state !== 'pending') return
      waiter.state = 'cancelled'
      waiter.settle('cancelled')
    }

    this.waiters.push(waiter)
    signal?.addEventListener('abort', onAbort, { once: true })

    const outcome = await woken

    this.removeWaiter(waiter)
    signal?.removeEventListener('abort', onAbort)

    try {
      if (signal && (outcome === 'cancelled' || signal.aborted)) {
        if (outcome === 'granted') this.credit(amount)
        throw abortReason(signal)
      }
    } finally {
      // release() wakes a single waiter; the woken one drains the rest.
      this.wakeUpAll()
    }
  }

  private removeWaiter(waiter: Waiter<T>): void {
    const idx = this.waiters.indexOf(waiter)
    if (idx !== -1) this.waiters.splice(idx, 1)
  }
}
