import { findElementById } from '../../evidence/html.js'
import { extractElementId } from '../classifyCheck.js'
import { type Evaluator, pass, fail } from './types.js'

export const evaluateElementById: Evaluator = (evidence, checkText) => {
  const id = extractElementId(checkText)
  if (id === null) return fail('Could not extract an element id from the check text')

  const parsed = evidence.indexDocument()
  if (parsed === null) return fail('index.html missing, cannot check for element')

  const lookup = findElementById(parsed.document, id)
  if (lookup.found) {
    return pass(`Element with id='${id}' found (<${lookup.tagName ?? 'unknown'}> tag)`)
  }
  const note = parsed.fault ? ` (${parsed.fault.message})` : ''
  return fail(`Element with id='${id}' NOT found in HTML${note}`)
}
