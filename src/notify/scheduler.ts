/**
 * Timer source for retry waits. Each wait is its own timer, so concurrent
 * dispatches never block one another; an abort ends the wait early.
 */

export type DelayOutcome = 'elapsed' | 'cancelled'

export interface Scheduler {
  delay(ms: number, signal?: AbortSignal): Promise<DelayOutcome>
}

export const timerScheduler: Scheduler = {
  delay(ms, signal) {
    return new Promise(resolve => {
      if (signal?.aborted) {
        resolve('cancelled')
        return
      }
      const onAbort = () => {
        clearTimeout(timeoutId)
        resolve('cancelled')
      }
      const timeoutId = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort)
        resolve('elapsed')
      }, ms)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  },
}
