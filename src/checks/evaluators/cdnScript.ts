import { findCdnLink } from '../../evidence/html.js'
import { extractRequestedVersion } from '../classifyCheck.js'
import { type Evaluator, pass, fail } from './types.js'

const LIBRARY = 'bootstrap'
const LABEL = 'Bootstrap'

export const evaluateCdnScript: Evaluator = (evidence, checkText) => {
  const parsed = evidence.indexDocument()
  if (parsed === null) return fail('index.html missing')

  const version = extractRequestedVersion(checkText)
  const lookup = findCdnLink(parsed.document, LIBRARY, version)

  if (lookup.found) {
    const label = version === null ? `${LABEL} CDN link found` : `${LABEL} ${version} CDN link found`
    return pass(`${label}: ${lookup.url ?? ''}`.trim())
  }
  if (lookup.libraryFound && version !== null) {
    const actual = lookup.matchedVersion ?? 'unknown'
    return fail(`${LABEL} found on CDN but version ${actual} does not match requested ${version}`)
  }
  return fail(`No ${LABEL} CDN link found in HTML`)
}
