/**
 * @entry Shared 公共基础设施模块
 *
 * 底层工具函数，无业务逻辑依赖
 *
 * 能力分组：
 * - Result<T,E>: 函数式错误处理（ok/err/unwrapOr/map/fromPromise/fromThrowable）
 * - AppError: 统一错误类型（printError）
 * - Logger: 日志系统（createLogger/setLogLevel/logError）
 * - 错误守卫: isError/getErrorMessage/ensureError
 */

// Result 类型
export {
  type Result,
  ok,
  err,
  isOk,
  isErr,
  unwrapOr,
  map,
  fromPromise,
  fromThrowable,
} from './result.js'

// 错误处理
export { AppError, printError, type ErrorCategory, type ErrorCode } from './error.js'

// 日志
export {
  createLogger,
  logger,
  logError,
  setLogLevel,
  type Logger,
  type LogLevel,
  type ErrorContext,
} from './logger.js'

// 错误守卫
export { isError, getErrorMessage, ensureError } from './assertError.js'
