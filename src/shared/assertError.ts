/**
 * 未知抛出值的收敛工具
 * evaluator、解析器、fetch 抛出的东西不一定是 Error
 */

export function isError(value: unknown): value is Error {
  return value instanceof Error
}

// 取可读消息，非 Error 值按字符串处理
export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message
  return typeof error === 'string' ? error : String(error)
}

export function ensureError(value: unknown): Error {
  return isError(value) ? value : new Error(getErrorMessage(value))
}
