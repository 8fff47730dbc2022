/**
 * 校验日志格式
 * 运维脚本会抓取这些行：横幅、阶段名、✓/✗ 行、汇总行的形状不要改
 */

import type { CheckResult } from '../types/check.js'
import type { ChecksResult, LiveResult, StaticResult, ValidationReport } from '../types/report.js'

export const BANNER = '='.repeat(70)

export const STAGE_NAMES = {
  static: 'STATIC FILES',
  requirements: 'REQUIREMENTS',
  live: 'LIVE PAGE',
} as const

export function formatStageHeader(stageName: string): string[] {
  return [BANNER, `VALIDATION: ${stageName}`, BANNER]
}

export function formatCheckLine(result: CheckResult): string {
  return `  ${result.passed ? '✓' : '✗'} ${result.spec.rawText}: ${result.detail}`
}

export function formatChecksSummary(checks: ChecksResult): string {
  return `Checks validation summary: ${checks.passedCount}/${checks.totalCount} passed`
}

export function formatStaticSection(result: StaticResult): string[] {
  return [
    ...formatStageHeader(STAGE_NAMES.static),
    ...result.errors.map(e => `  ✗ ${e}`),
    ...result.warnings.map(w => `  ! ${w}`),
    `Static validation: ${result.errors.length} errors, ${result.warnings.length} warnings`,
  ]
}

export function formatChecksSection(checks: ChecksResult): string[] {
  return [
    ...formatStageHeader(STAGE_NAMES.requirements),
    ...checks.results.map(formatCheckLine),
    formatChecksSummary(checks),
  ]
}

export function formatLiveSection(live: LiveResult | null): string[] {
  const header = formatStageHeader(STAGE_NAMES.live)
  if (!live) return [...header, 'Live validation skipped: no pages URL']

  const { pageInfo } = live
  return [
    ...header,
    `  ${live.url} → HTTP ${pageInfo.statusCode} in ${pageInfo.responseTimeMs}ms (${pageInfo.htmlSizeBytes} bytes)`,
    ...live.checks.map(formatCheckLine),
    ...live.errors.filter(e => !e.startsWith('Live check failed:')).map(e => `  ✗ ${e}`),
    ...live.warnings.map(w => `  ! ${w}`),
    `Live page validation: ${live.errors.length} errors, ${live.warnings.length} warnings`,
  ]
}

export function formatCompletion(report: ValidationReport): string[] {
  const live = report.liveResult ? (report.liveResult.passed ? 'passed' : 'failed') : 'skipped'
  return [
    BANNER,
    'VALIDATION COMPLETE',
    `  static: ${report.staticResult.passed ? 'passed' : 'failed'}`,
    `  checks: ${report.checksResult.passedCount}/${report.checksResult.totalCount} passed`,
    `  live: ${live}`,
    ...report.stageErrors.map(e => `  ✗ ${e}`),
    BANNER,
  ]
}

/** Whole report in log order */
export function formatValidationLog(report: ValidationReport): string[] {
  return [
    ...formatStaticSection(report.staticResult),
    ...formatChecksSection(report.checksResult),
    ...formatLiveSection(report.liveResult),
    ...formatCompletion(report),
  ]
}
