import { extractKeywords } from '../../evidence/keywords.js'
import { type Evaluator, pass, fail } from './types.js'

const LOW_CONFIDENCE = 'low-confidence keyword match'

export const evaluateGeneric: Evaluator = (evidence, checkText) => {
  const keywords = extractKeywords(checkText)
  if (keywords.length === 0) {
    return fail(`No meaningful keywords in check text (${LOW_CONFIDENCE})`, 'low')
  }

  const content = evidence.allContent().toLowerCase()
  const found = keywords.filter(keyword => content.includes(keyword))
  if (found.length > 0) {
    return pass(`Keywords found: ${found.join(', ')} of ${keywords.length} (${LOW_CONFIDENCE})`, 'low')
  }
  return fail(`None of the keywords found: ${keywords.join(', ')} (${LOW_CONFIDENCE})`, 'low')
}
