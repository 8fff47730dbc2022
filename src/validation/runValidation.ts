/**
 * 校验编排
 * Static → Requirements → Live，顺序固定；任何阶段的异常都只记录到报告里，
 * 绝不向调用方（发布流水线）抛出
 */

import type { CheckResult, CheckSpec, FileSet } from '../types/check.js'
import type { ChecksResult, LiveResult, StaticResult, ValidationReport } from '../types/report.js'
import { toCheckSpecs } from '../types/check.js'
import type { HttpClient } from '../http/httpClient.js'
import { createLogger, type Logger } from '../shared/logger.js'
import { fromPromise, fromThrowable } from '../shared/result.js'
import { classifyCheck } from '../checks/classifyCheck.js'
import { summarizeChecks, validateChecks } from '../checks/matchCheck.js'
import { validateStatic, missingFilesResult, NO_FILES_ERROR } from './staticValidator.js'
import { validateLive, NO_RESPONSE_STATUS } from './liveValidator.js'
import {
  formatChecksSection,
  formatCompletion,
  formatLiveSection,
  formatStaticSection,
} from './formatReport.js'

const defaultLogger = createLogger('validation')

export interface PrePublishInput {
  /** null when generation failed */
  files: FileSet | null
  checks: readonly string[]
}

export interface LiveValidationDeps {
  http: HttpClient
  pageTimeoutMs: number
  minPageBytes?: number
}

export interface ValidationOptions {
  logger?: Logger
}

/** Static + requirements results, before the live stage has run */
export type PrePublishReport = Omit<ValidationReport, 'liveResult' | 'finishedAt'>

function logLines(log: Logger, lines: string[]): void {
  for (const line of lines) log.info(line)
}

function failedChecks(checks: readonly CheckSpec[], detail: string): ChecksResult {
  const results = checks.map((spec): CheckResult => ({
    spec,
    category: classifyCheck(spec.rawText),
    passed: false,
    detail,
    confidence: 'high',
  }))
  return summarizeChecks(results)
}

function faultedLive(url: string, message: string): LiveResult {
  return {
    passed: false,
    url,
    pageInfo: { statusCode: NO_RESPONSE_STATUS, responseTimeMs: 0, htmlSizeBytes: 0 },
    errors: [`Live validation fault: ${message}`],
    warnings: [],
    checks: [],
  }
}

function runStaticStage(files: FileSet | null, stageErrors: string[]): StaticResult {
  if (files === null) return missingFilesResult()

  const result = fromThrowable(() => validateStatic(files))
  if (result.ok) return result.value

  stageErrors.push(`static stage fault: ${result.error.message}`)
  return {
    passed: false,
    errors: [`Static validation fault: ${result.error.message}`],
    warnings: [],
    totalFiles: Object.keys(files).length,
    filesValidated: [],
  }
}

function runRequirementsStage(
  files: FileSet | null,
  specs: readonly CheckSpec[],
  stageErrors: string[]
): ChecksResult {
  if (files === null) return failedChecks(specs, NO_FILES_ERROR)

  const result = fromThrowable(() => validateChecks(files, specs))
  if (result.ok) return result.value

  stageErrors.push(`requirements stage fault: ${result.error.message}`)
  return failedChecks(specs, `Internal evaluation fault: ${result.error.message}`)
}

/**
 * Static and requirements stages. Runs before publishing, never throws.
 */
export function runPrePublishValidation(
  input: PrePublishInput,
  options: ValidationOptions = {}
): PrePublishReport {
  const log = options.logger ?? defaultLogger
  const startedAt = new Date().toISOString()
  const stageErrors: string[] = []
  const specs = toCheckSpecs(input.checks)

  const staticResult = runStaticStage(input.files, stageErrors)
  logLines(log, formatStaticSection(staticResult))

  const checksResult = runRequirementsStage(input.files, specs, stageErrors)
  logLines(log, formatChecksSection(checksResult))

  return { staticResult, checksResult, stageErrors, startedAt }
}

/**
 * Live stage plus the final report. `pagesUrl` null leaves liveResult null.
 */
export async function completeValidation(
  pending: PrePublishReport,
  pagesUrl: string | null,
  deps: LiveValidationDeps,
  options: ValidationOptions = {}
): Promise<ValidationReport> {
  const log = options.logger ?? defaultLogger
  const stageErrors = [...pending.stageErrors]
  let liveResult: LiveResult | null = null

  if (pagesUrl) {
    const specs = pending.checksResult.results.map(r => r.spec)
    const result = await fromPromise(
      validateLive(pagesUrl, specs, {
        http: deps.http,
        timeoutMs: deps.pageTimeoutMs,
        minPageBytes: deps.minPageBytes,
      })
    )
    if (result.ok) {
      liveResult = result.value
    } else {
      stageErrors.push(`live stage fault: ${result.error.message}`)
      liveResult = faultedLive(pagesUrl, result.error.message)
    }
  }
  logLines(log, formatLiveSection(liveResult))

  const report: ValidationReport = {
    staticResult: pending.staticResult,
    checksResult: pending.checksResult,
    liveResult,
    stageErrors,
    startedAt: pending.startedAt,
    finishedAt: new Date().toISOString(),
  }
  logLines(log, formatCompletion(report))
  return report
}

export interface ValidationInput extends PrePublishInput {
  pagesUrl: string | null
}

/** All three stages in one go */
export async function runValidation(
  input: ValidationInput,
  deps: LiveValidationDeps,
  options: ValidationOptions = {}
): Promise<ValidationReport> {
  const pending = runPrePublishValidation(input, options)
  return completeValidation(pending, input.pagesUrl, deps, options)
}
