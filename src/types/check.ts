/** One free-text acceptance check, identified by its exact text */
export interface CheckSpec {
  readonly rawText: string
}

export type CheckCategory =
  | 'mit_license'
  | 'readme_quality'
  | 'html_element_by_id'
  | 'cdn_script_presence'
  | 'arithmetic_operations'
  | 'generic'

/** Categories that can be re-verified against a fetched live page */
export const LIVE_OBSERVABLE_CATEGORIES: readonly CheckCategory[] = [
  'html_element_by_id',
  'cdn_script_presence',
]

/** 'low' marks keyword-only heuristics */
export type CheckConfidence = 'high' | 'low'

export interface CheckResult {
  readonly spec: CheckSpec
  readonly category: CheckCategory
  readonly passed: boolean
  /** Never empty, on pass or fail */
  readonly detail: string
  readonly confidence: CheckConfidence
}

/** Generated artifact: filename → text, keys are case-sensitive */
export type FileSet = Readonly<Record<string, string>>

export function toCheckSpecs(checks: readonly string[]): CheckSpec[] {
  return checks.map(rawText => ({ rawText }))
}
