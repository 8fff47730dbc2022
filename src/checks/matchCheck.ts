import type { CheckCategory, CheckResult, CheckSpec, FileSet } from '../types/check.js'
import type { ChecksResult } from '../types/report.js'
import { LIVE_OBSERVABLE_CATEGORIES } from '../types/check.js'
import { createFileEvidence, type Evidence } from '../evidence/evidence.js'
import { AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { classifyCheck } from './classifyCheck.js'
import { EVALUATORS, type Verdict } from './evaluators/index.js'

const logger = createLogger('checks')

function runEvaluator(category: CheckCategory, evidence: Evidence, spec: CheckSpec): Verdict {
  try {
    const verdict = EVALUATORS[category](evidence, spec.rawText)
    if (verdict.detail.trim().length === 0) {
      throw new Error(`evaluator '${category}' returned an empty detail`)
    }
    return verdict
  } catch (error) {
    const fault = AppError.evaluation(spec.rawText, error)
    logger.warn(fault.message)
    return { passed: false, detail: `Internal evaluation fault: ${fault.message}`, confidence: 'high' }
  }
}

/**
 * Classify one check and evaluate it against the evidence. Never throws: an
 * evaluator fault becomes a failed result naming the fault.
 */
export function matchCheck(evidence: Evidence, spec: CheckSpec): CheckResult {
  let category: CheckCategory
  try {
    category = classifyCheck(spec.rawText)
  } catch (error) {
    const fault = AppError.evaluation(spec.rawText, error)
    return {
      spec,
      category: 'generic',
      passed: false,
      detail: `Internal evaluation fault: ${fault.message}`,
      confidence: 'low',
    }
  }

  const verdict = runEvaluator(category, evidence, spec)
  return { spec, category, ...verdict }
}

export function summarizeChecks(results: CheckResult[]): ChecksResult {
  return {
    results,
    passedCount: results.filter(r => r.passed).length,
    totalCount: results.length,
  }
}

/** One result per supplied check, in supplied order */
export function validateChecks(files: FileSet, checks: readonly CheckSpec[]): ChecksResult {
  const evidence = createFileEvidence(files)
  return summarizeChecks(checks.map(spec => matchCheck(evidence, spec)))
}

/** Checks that stay meaningful against the live page; the rest are skipped */
export function selectLiveChecks(checks: readonly CheckSpec[]): CheckSpec[] {
  return checks.filter(spec => LIVE_OBSERVABLE_CATEGORIES.includes(classifyCheck(spec.rawText)))
}

export function evaluateLiveChecks(evidence: Evidence, checks: readonly CheckSpec[]): CheckResult[] {
  return selectLiveChecks(checks).map(spec => matchCheck(evidence, spec))
}
