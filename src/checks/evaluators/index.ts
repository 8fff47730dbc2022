import type { CheckCategory } from '../../types/check.js'
import type { Evaluator } from './types.js'
import { evaluateMitLicense } from './mitLicense.js'
import { evaluateReadmeQuality } from './readmeQuality.js'
import { evaluateElementById } from './elementById.js'
import { evaluateCdnScript } from './cdnScript.js'
import { evaluateArithmetic } from './arithmetic.js'
import { evaluateGeneric } from './generic.js'

export type { Evaluator, Verdict } from './types.js'

export const EVALUATORS: Record<CheckCategory, Evaluator> = {
  mit_license: evaluateMitLicense,
  readme_quality: evaluateReadmeQuality,
  html_element_by_id: evaluateElementById,
  cdn_script_presence: evaluateCdnScript,
  arithmetic_operations: evaluateArithmetic,
  generic: evaluateGeneric,
}

export {
  evaluateMitLicense,
  evaluateReadmeQuality,
  evaluateElementById,
  evaluateCdnScript,
  evaluateArithmetic,
  evaluateGeneric,
}
