/** Let every queued promise continuation run. */
export function tick(): Promise<void> {
  return new Promise<void>((resolve) => {
    setImmediate(() => resolve())
  })
}

export interface Tracked<T> {
  promise: Promise<T>
  settled: boolean
  rejected: boolean
}

/** Watch a promise without awaiting it. */
export function track<T>(promise: Promise<T>): Tracked<T> {
  const tracked: Tracked<T> = { promise, settled: false, rejected: false }
  void promise.then(
    () => {
      tracked.settled = true
    },
    () => {
      tracked.settled = true
      tracked.rejected = true
    },
  )
  return tracked
}

export interface Gate {
  promise: Promise<void>
  open: () => void
}

/** A promise the test resolves by hand, to hold a lease open. */
export function gate(): Gate {
  const g: Gate = { promise: Promise.resolve(), open: () => {} }
  g.promise = new Promise<void>((resolve) => {
    g.open = resolve
  })
  return g
}
