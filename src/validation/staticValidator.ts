import type { FileSet } from '../types/check.js'
import type { StaticResult } from '../types/report.js'
import { findRequiredFile, isEmpty, licenseIsMit, readmeQuality, README_MIN_LENGTH } from '../evidence/files.js'

export const REQUIRED_FILES = ['index.html', 'LICENSE', 'README.md'] as const

export const NO_FILES_ERROR = 'No generated files to validate'

function checkHtmlSkeleton(html: string, errors: string[], warnings: string[]): void {
  const lower = html.toLowerCase()
  if (!lower.includes('<!doctype')) errors.push('index.html missing DOCTYPE declaration')
  if (!/<html[\s>]/.test(lower)) errors.push('index.html missing <html> tag')
  if (!/<body[\s>]/.test(lower)) errors.push('index.html missing <body> tag')
  if (!/<head[\s>]/.test(lower)) warnings.push('index.html missing <head> tag')
  if (!/<title[\s>]/.test(lower)) warnings.push('index.html missing <title> tag')
}

function checkReadme(readme: string, errors: string[], warnings: string[]): void {
  const quality = readmeQuality(readme)
  if (quality.length <= README_MIN_LENGTH) {
    errors.push(`README.md is too short (${quality.length} chars, need more than ${README_MIN_LENGTH})`)
  }
  if (!quality.hasHeadings) errors.push('README.md lacks markdown headings')
  if (!quality.hasSections) warnings.push('README.md has fewer than two sections')
}

/**
 * Fixed battery over the generated files, independent of the check list.
 * Every failing assertion is reported; nothing short-circuits.
 */
export function validateStatic(files: FileSet): StaticResult {
  const errors: string[] = []
  const warnings: string[] = []

  for (const name of REQUIRED_FILES) {
    const content = findRequiredFile(files, name)
    if (content === null) {
      errors.push(`Missing required file: ${name}`)
    } else if (isEmpty(content)) {
      errors.push(`${name} is empty or whitespace only`)
    }
  }

  const license = findRequiredFile(files, 'LICENSE')
  if (license !== null && !licenseIsMit(license)) {
    errors.push('LICENSE file does not appear to be MIT license')
  }

  const readme = findRequiredFile(files, 'README.md')
  if (readme !== null) checkReadme(readme, errors, warnings)

  const html = findRequiredFile(files, 'index.html')
  if (html !== null) checkHtmlSkeleton(html, errors, warnings)

  return {
    passed: errors.length === 0,
    errors,
    warnings,
    totalFiles: Object.keys(files).length,
    filesValidated: REQUIRED_FILES.filter(name => findRequiredFile(files, name) !== null),
  }
}

/** Generation produced nothing: a hard fail, not a fault */
export function missingFilesResult(): StaticResult {
  return { passed: false, errors: [NO_FILES_ERROR], warnings: [], totalFiles: 0, filesValidated: [] }
}
