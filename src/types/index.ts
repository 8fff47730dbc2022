/**
 * @entry Types 类型定义模块
 *
 * - check: CheckSpec/CheckCategory/CheckResult/FileSet
 * - report: StaticResult/ChecksResult/LiveResult/PageInfo/ValidationReport
 * - task: BuildTask/Deployment + Generator/Publisher 协作方接口
 * - notification: NotifyState/NotificationAttempt/NotificationPayload
 */

export type {
  CheckSpec,
  CheckCategory,
  CheckConfidence,
  CheckResult,
  FileSet,
} from './check.js'
export { LIVE_OBSERVABLE_CATEGORIES, toCheckSpecs } from './check.js'

export type {
  StaticResult,
  ChecksResult,
  PageInfo,
  LiveResult,
  ValidationStage,
  ValidationReport,
} from './report.js'

export type { Attachment, BuildTask, Deployment, Generator, Publisher } from './task.js'

export type {
  NotifyState,
  NotifyTerminalState,
  AttemptOutcome,
  NotificationAttempt,
  NotificationPayload,
  NotificationOutcome,
  WireCheckResult,
  WirePageInfo,
  WireValidationReport,
} from './notification.js'
