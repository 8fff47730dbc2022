/**
 * 回调通知状态机
 *
 * pending → attempting → success
 *                      ↘ retrying → attempting …
 *                      ↘ abandoned（重试耗尽 / 永久错误 / 取消）
 */

import type { NotifyState, NotifyTerminalState } from '../types/notification.js'
import { AppError } from '../shared/error.js'

export type NotifyEvent =
  | 'start'
  | 'succeeded'
  | 'failed'
  | 'retry_due'
  | 'exhausted'
  | 'permanent_error'
  | 'cancelled'

export const NOTIFY_TRANSITIONS: Readonly<Record<NotifyState, Partial<Record<NotifyEvent, NotifyState>>>> = {
  pending: { start: 'attempting', permanent_error: 'abandoned', cancelled: 'abandoned' },
  attempting: {
    succeeded: 'success',
    failed: 'retrying',
    exhausted: 'abandoned',
    permanent_error: 'abandoned',
  },
  retrying: { retry_due: 'attempting', cancelled: 'abandoned' },
  success: {},
  abandoned: {},
}

/** Throws only on a programming error (event not allowed in state) */
export function transition(state: NotifyState, event: NotifyEvent): NotifyState {
  const next = NOTIFY_TRANSITIONS[state][event]
  if (!next) throw AppError.illegalTransition(state, event)
  return next
}

export function isTerminalState(state: NotifyState): state is NotifyTerminalState {
  return state === 'success' || state === 'abandoned'
}
