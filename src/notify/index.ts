/**
 * @entry Notify 回调通知模块
 *
 * - buildNotificationPayload(): 组装回调 payload（含完整校验报告，snake_case）
 * - toWireReport(): ValidationReport 转为回调的 snake_case 形态
 * - dispatchNotification(): 带指数退避的投递，显式状态机驱动
 * - NOTIFY_TRANSITIONS/transition(): 状态转移表
 * - timerScheduler: 默认定时器，可注入替换
 */

export { buildNotificationPayload, toWireReport } from './buildPayload.js'
export {
  dispatchNotification,
  isValidCallbackUrl,
  DEFAULT_RETRY_DELAYS_SECONDS,
  DEFAULT_NOTIFY_TIMEOUT_MS,
  type DispatchOptions,
} from './dispatchNotification.js'
export { NOTIFY_TRANSITIONS, transition, isTerminalState, type NotifyEvent } from './notifyMachine.js'
export { timerScheduler, type Scheduler, type DelayOutcome } from './scheduler.js'
