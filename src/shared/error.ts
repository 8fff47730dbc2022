/**
 * 统一错误处理
 * 错误分类对应校验流水线的故障边界：证据、评估、网络、配置、外部协作方
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

export type ErrorCategory =
  | 'EVIDENCE' // 证据提取失败（解析/读取）
  | 'EVALUATION' // 单条检查内部异常
  | 'NETWORK' // 拉取页面 / 回调失败
  | 'TIMEOUT' // 请求超时
  | 'CONFIG' // 配置缺失或非法
  | 'COLLABORATOR' // 生成器 / 发布器失败
  | 'VALIDATION' // 入参校验
  | 'INTERNAL' // 状态机等程序错误
  | 'UNKNOWN'

export type ErrorCode =
  | 'ERR_EVIDENCE'
  | 'ERR_EVALUATION'
  | 'ERR_NETWORK'
  | 'ERR_TIMEOUT'
  | 'ERR_CALLBACK_URL'
  | 'CONFIG_INVALID'
  | 'CONFIG_MISSING'
  | 'ERR_GENERATION'
  | 'ERR_PUBLISH'
  | 'ERR_VALIDATION'
  | 'ERR_ILLEGAL_TRANSITION'
  | 'ERR_UNKNOWN'

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public override readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /**
   * 格式化错误输出到终端
   */
  format(): string {
    const lines: string[] = ['']
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${categoryColors[this.category](this.category)}]`)
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)
    if (this.suggestion) {
      lines.push(chalk.cyan('  suggestion:') + ` ${this.suggestion}`)
    }
    lines.push('')
    return lines.join('\n')
  }

  // ============ 工厂方法 ============

  static evidence(reason: string, cause?: unknown): AppError {
    return new AppError('ERR_EVIDENCE', `Evidence extraction failed: ${reason}`, 'EVIDENCE', cause)
  }

  static evaluation(checkText: string, cause: unknown): AppError {
    return new AppError(
      'ERR_EVALUATION',
      `Evaluator fault for "${checkText}": ${getErrorMessage(cause)}`,
      'EVALUATION',
      cause
    )
  }

  static network(message: string, cause?: unknown): AppError {
    return new AppError('ERR_NETWORK', message, 'NETWORK', cause, 'Check that the URL is reachable')
  }

  static timeout(timeoutMs: number, url: string): AppError {
    return new AppError(
      'ERR_TIMEOUT',
      `Request to ${url} timed out after ${timeoutMs}ms`,
      'TIMEOUT',
      undefined,
      'Increase the timeout or check the endpoint'
    )
  }

  static callbackUrl(url: string): AppError {
    return new AppError(
      'ERR_CALLBACK_URL',
      `Malformed callback URL: ${url}`,
      'VALIDATION',
      undefined,
      'The callback URL must be an absolute http(s) URL'
    )
  }

  static configInvalid(reason: string): AppError {
    return new AppError('CONFIG_INVALID', `Invalid config: ${reason}`, 'CONFIG')
  }

  static configMissing(key: string): AppError {
    return new AppError(
      'CONFIG_MISSING',
      `Missing required setting: ${key}`,
      'CONFIG',
      undefined,
      `Set ${key} in .artifact-verifier.yaml or the environment`
    )
  }

  static generation(reason: string, cause?: unknown): AppError {
    return new AppError('ERR_GENERATION', `Generation failed: ${reason}`, 'COLLABORATOR', cause)
  }

  static publish(reason: string, cause?: unknown): AppError {
    return new AppError('ERR_PUBLISH', `Publish failed: ${reason}`, 'COLLABORATOR', cause)
  }

  static illegalTransition(from: string, event: string): AppError {
    return new AppError(
      'ERR_ILLEGAL_TRANSITION',
      `Illegal notification transition: ${from} --${event}-->`,
      'INTERNAL'
    )
  }

  static unknown(cause: unknown): AppError {
    return new AppError('ERR_UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }

  /** 已是 AppError 则原样返回，否则包装为 UNKNOWN */
  static from(cause: unknown): AppError {
    return cause instanceof AppError ? cause : AppError.unknown(cause)
  }
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  EVIDENCE: chalk.yellow,
  EVALUATION: chalk.yellow,
  NETWORK: chalk.red,
  TIMEOUT: chalk.magenta,
  CONFIG: chalk.yellow,
  COLLABORATOR: chalk.red,
  VALIDATION: chalk.yellow,
  INTERNAL: chalk.red,
  UNKNOWN: chalk.gray,
}

/**
 * 打印错误到终端
 */
export function printError(error: unknown): void {
  console.error(AppError.from(error).format())
}
