import type { BuildTask, Deployment } from '../types/task.js'
import type { CheckResult } from '../types/check.js'
import type { PageInfo, ValidationReport } from '../types/report.js'
import type {
  NotificationPayload,
  WireCheckResult,
  WirePageInfo,
  WireValidationReport,
} from '../types/notification.js'

function toWireCheck(result: CheckResult): WireCheckResult {
  return {
    check: result.spec.rawText,
    category: result.category,
    passed: result.passed,
    detail: result.detail,
    confidence: result.confidence,
  }
}

function toWirePageInfo(info: PageInfo): WirePageInfo {
  return {
    status_code: info.statusCode,
    response_time_ms: info.responseTimeMs,
    html_size_bytes: info.htmlSizeBytes,
    title: info.title ?? null,
    scripts_count: info.scriptsCount ?? null,
    links_count: info.linksCount ?? null,
  }
}

export function toWireReport(report: ValidationReport): WireValidationReport {
  const { staticResult, checksResult, liveResult } = report
  return {
    static_result: {
      passed: staticResult.passed,
      errors: staticResult.errors,
      warnings: staticResult.warnings,
      total_files: staticResult.totalFiles,
      files_validated: staticResult.filesValidated,
    },
    checks_result: {
      results: checksResult.results.map(toWireCheck),
      passed_count: checksResult.passedCount,
      total_count: checksResult.totalCount,
    },
    live_result: liveResult && {
      passed: liveResult.passed,
      url: liveResult.url,
      page_info: toWirePageInfo(liveResult.pageInfo),
      errors: liveResult.errors,
      warnings: liveResult.warnings,
      checks: liveResult.checks.map(toWireCheck),
    },
    stage_errors: report.stageErrors,
    started_at: report.startedAt,
    finished_at: report.finishedAt,
  }
}

/**
 * Callback body. A failed publish still notifies, with empty repository fields.
 */
export function buildNotificationPayload(
  task: BuildTask,
  deployment: Deployment | null,
  report: ValidationReport
): NotificationPayload {
  return {
    email: task.email,
    task: task.task,
    round: task.round,
    nonce: task.nonce,
    repo_url: deployment?.repoUrl ?? '',
    commit_sha: deployment?.commitSha ?? '',
    pages_url: deployment?.pagesUrl ?? '',
    validation: toWireReport(report),
  }
}
