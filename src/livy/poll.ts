import { PollTimeoutError } from './types'

// ─── Delay ────────────────────────────────────────────────────────────────────

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

/** setTimeout-backed sleep that rejects as soon as `signal` aborts. */
export const delay: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'))
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(new Error('Aborted'))
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })

// ─── Deadline ─────────────────────────────────────────────────────────────────

/** Bounds a poll loop. Without a timeout `check()` never fires. */
export class PollDeadline {
  private readonly expiresAt: number | undefined

  constructor(
    private readonly what: string,
    private readonly timeoutMs: number | undefined,
    private readonly now: () => number = Date.now
  ) {
    this.expiresAt = timeoutMs === undefined ? undefined : now() + timeoutMs
  }

  check(): void {
    if (this.expiresAt !== undefined && this.timeoutMs !== undefined && this.now() > this.expiresAt) {
      throw new PollTimeoutError(this.what, this.timeoutMs)
    }
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new Error('Aborted')
  }
}
