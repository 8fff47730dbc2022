import type { CheckResult } from './check.js'

export interface StaticResult {
  passed: boolean
  errors: string[]
  warnings: string[]
  totalFiles: number
  filesValidated: string[]
}

export interface ChecksResult {
  results: CheckResult[]
  passedCount: number
  totalCount: number
}

/** Snapshot of one live fetch; statusCode is -1 when no response arrived */
export interface PageInfo {
  statusCode: number
  responseTimeMs: number
  htmlSizeBytes: number
  title?: string | null
  scriptsCount?: number
  linksCount?: number
}

export interface LiveResult {
  passed: boolean
  url: string
  pageInfo: PageInfo
  errors: string[]
  warnings: string[]
  checks: CheckResult[]
}

export type ValidationStage = 'static' | 'requirements' | 'live'

export interface ValidationReport {
  staticResult: StaticResult
  checksResult: ChecksResult
  /** null when live validation could not run (no pages URL yet) */
  liveResult: LiveResult | null
  /** Internal faults contained at a stage boundary */
  stageErrors: string[]
  startedAt: string
  finishedAt: string
}
