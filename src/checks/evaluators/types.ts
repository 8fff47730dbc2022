import type { CheckConfidence } from '../../types/check.js'
import type { Evidence } from '../../evidence/evidence.js'

export interface Verdict {
  passed: boolean
  detail: string
  confidence: CheckConfidence
}

/** Must not throw for missing evidence: absence is a normal fail */
export type Evaluator = (evidence: Evidence, checkText: string) => Verdict

export const pass = (detail: string, confidence: CheckConfidence = 'high'): Verdict => ({
  passed: true,
  detail,
  confidence,
})

export const fail = (detail: string, confidence: CheckConfidence = 'high'): Verdict => ({
  passed: false,
  detail,
  confidence,
})
