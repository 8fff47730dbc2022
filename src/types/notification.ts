import type { CheckCategory, CheckConfidence } from './check.js'

export type NotifyState = 'pending' | 'attempting' | 'retrying' | 'success' | 'abandoned'

export type NotifyTerminalState = Extract<NotifyState, 'success' | 'abandoned'>

export type AttemptOutcome = 'success' | 'transient_failure' | 'abandoned'

export interface NotificationAttempt {
  attemptNumber: number
  /** Wait before this attempt; 0 for the first one */
  scheduledDelaySeconds: number
  outcome: AttemptOutcome
  statusCode?: number
  error?: string
}

// ============ Callback wire format (snake_case throughout) ============

export interface WireCheckResult {
  check: string
  category: CheckCategory
  passed: boolean
  detail: string
  confidence: CheckConfidence
}

export interface WirePageInfo {
  status_code: number
  response_time_ms: number
  html_size_bytes: number
  title: string | null
  scripts_count: number | null
  links_count: number | null
}

export interface WireValidationReport {
  static_result: {
    passed: boolean
    errors: string[]
    warnings: string[]
    total_files: number
    files_validated: string[]
  }
  checks_result: {
    results: WireCheckResult[]
    passed_count: number
    total_count: number
  }
  live_result: {
    passed: boolean
    url: string
    page_info: WirePageInfo
    errors: string[]
    warnings: string[]
    checks: WireCheckResult[]
  } | null
  stage_errors: string[]
  started_at: string
  finished_at: string
}

export interface NotificationPayload {
  email: string
  task: string
  round: number
  nonce: string
  repo_url: string
  commit_sha: string
  pages_url: string
  validation: WireValidationReport
}

export interface NotificationOutcome {
  state: NotifyTerminalState
  attempts: NotificationAttempt[]
  /** Set when abandoned */
  reason?: string
}
