import { analyzeArithmeticCode } from '../../evidence/code.js'
import { type Evaluator, pass, fail } from './types.js'

export const evaluateArithmetic: Evaluator = evidence => {
  const code = evidence.scriptSources()
  if (code.trim().length === 0) return fail('No script code found to inspect')

  const { hasFunctions, hasOperators } = analyzeArithmeticCode(code)
  if (hasFunctions && hasOperators) {
    return pass('Code contains functions and arithmetic operators (heuristic)')
  }

  const missing: string[] = []
  if (!hasFunctions) missing.push('no functions')
  if (!hasOperators) missing.push('no arithmetic operators')
  return fail(`Code may not perform operations: ${missing.join(', ')} (heuristic)`)
}
