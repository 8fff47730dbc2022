/**
 * 回调通知投递
 * 2xx 即成功；其他状态码、超时、网络错误都进入重试，按 1,2,4,8,16 秒退避，
 * 最多 6 次尝试。回调地址非法属于永久错误，直接放弃。结果只记日志，不抛出。
 */

import type { NotificationAttempt, NotificationOutcome, NotifyState } from '../types/notification.js'
import type { HttpClient } from '../http/httpClient.js'
import { isSuccessStatus } from '../http/httpClient.js'
import { AppError } from '../shared/error.js'
import { createLogger, logError, type Logger } from '../shared/logger.js'
import { transition } from './notifyMachine.js'
import { timerScheduler, type Scheduler } from './scheduler.js'

const defaultLogger = createLogger('notify')

export const DEFAULT_RETRY_DELAYS_SECONDS: readonly number[] = [1, 2, 4, 8, 16]
export const DEFAULT_NOTIFY_TIMEOUT_MS = 15_000

export interface DispatchOptions {
  http: HttpClient
  scheduler?: Scheduler
  /** Wait before each retry; its length is the retry budget */
  retryDelaysSeconds?: readonly number[]
  timeoutMs?: number
  /** Aborting cancels a pending retry wait */
  signal?: AbortSignal
  /** For log context only */
  taskId?: string
  logger?: Logger
}

export function isValidCallbackUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}

export async function dispatchNotification(
  url: string,
  payload: unknown,
  options: DispatchOptions
): Promise<NotificationOutcome> {
  const {
    http,
    scheduler = timerScheduler,
    retryDelaysSeconds = DEFAULT_RETRY_DELAYS_SECONDS,
    timeoutMs = DEFAULT_NOTIFY_TIMEOUT_MS,
    signal,
    taskId,
    logger = defaultLogger,
  } = options

  const attempts: NotificationAttempt[] = []
  let state: NotifyState = 'pending'
  let delaySeconds = 0

  const abandon = (event: 'permanent_error' | 'cancelled' | 'exhausted', reason: string): NotificationOutcome => {
    state = transition(state, event)
    logError(logger, 'Notification abandoned', reason, { taskId, url, attempt: attempts.length })
    return { state: 'abandoned', attempts, reason }
  }

  for (;;) {
    switch (state) {
      case 'pending': {
        if (!isValidCallbackUrl(url)) return abandon('permanent_error', AppError.callbackUrl(url).message)
        if (signal?.aborted) return abandon('cancelled', 'Cancelled before first attempt')
        state = transition(state, 'start')
        break
      }

      case 'attempting': {
        const attemptNumber = attempts.length + 1
        const response = await http.post(url, payload, timeoutMs)
        const statusCode = response.ok ? response.value.statusCode : undefined

        if (response.ok && isSuccessStatus(response.value.statusCode)) {
          attempts.push({ attemptNumber, scheduledDelaySeconds: delaySeconds, outcome: 'success', statusCode })
          state = transition(state, 'succeeded')
          logger.info(`✓ Notification delivered to ${url} (attempt ${attemptNumber})`)
          return { state: 'success', attempts }
        }

        const failure = response.ok ? `HTTP ${response.value.statusCode}` : response.error.message
        const nextDelay = retryDelaysSeconds[attemptNumber - 1]
        if (nextDelay === undefined) {
          attempts.push({
            attemptNumber,
            scheduledDelaySeconds: delaySeconds,
            outcome: 'abandoned',
            statusCode,
            error: failure,
          })
          return abandon('exhausted', `Retry budget exhausted after ${attemptNumber} attempts, last error: ${failure}`)
        }

        attempts.push({
          attemptNumber,
          scheduledDelaySeconds: delaySeconds,
          outcome: 'transient_failure',
          statusCode,
          error: failure,
        })
        logger.warn(`Notification attempt ${attemptNumber} failed (${failure}), retrying in ${nextDelay}s`)
        delaySeconds = nextDelay
        state = transition(state, 'failed')
        break
      }

      case 'retrying': {
        const waited = await scheduler.delay(delaySeconds * 1000, signal)
        if (waited === 'cancelled') return abandon('cancelled', 'Cancelled while waiting to retry')
        state = transition(state, 'retry_due')
        break
      }

      case 'success':
      case 'abandoned':
        return { state, attempts }
    }
  }
}
