/**
 * CLI 用户输出工具
 * 面向终端用户，简洁，无时间戳；诊断日志请使用 shared/logger.ts
 */

import chalk from 'chalk'

// ============ 基础输出 ============

export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}

// ============ 报告输出 ============

/** 按行首符号上色：横幅、✓、✗、! */
export function colorizeLine(line: string): string {
  if (line.startsWith('===')) return chalk.dim(line)
  if (line.startsWith('VALIDATION')) return chalk.bold(line)
  const trimmed = line.trimStart()
  if (trimmed.startsWith('✓')) return chalk.green(line)
  if (trimmed.startsWith('✗')) return chalk.red(line)
  if (trimmed.startsWith('!')) return chalk.yellow(line)
  return line
}

export function printLines(lines: readonly string[]): void {
  for (const line of lines) console.log(colorizeLine(line))
}
