import { readmeQuality, meetsReadmeFloor, describeReadmeIssues } from '../../evidence/files.js'
import { type Evaluator, pass, fail } from './types.js'

export const evaluateReadmeQuality: Evaluator = evidence => {
  const readme = evidence.file('README.md')
  if (readme === null) return fail('README.md missing')

  const quality = readmeQuality(readme)
  if (meetsReadmeFloor(quality)) {
    return pass(`README appears professional (${quality.length} chars, ${quality.headingCount} headings)`)
  }
  return fail(`README quality issues: ${describeReadmeIssues(quality).join(', ')}`)
}
