import { licenseIsMit } from '../../evidence/files.js'
import { type Evaluator, pass, fail } from './types.js'

export const evaluateMitLicense: Evaluator = evidence => {
  const license = evidence.file('LICENSE')
  if (license === null) return fail('LICENSE file missing')
  return licenseIsMit(license)
    ? pass('MIT License found')
    : fail('LICENSE exists but does not appear to be MIT')
}
