import type { FileSet } from '../types/check.js'

export const README_MIN_LENGTH = 200

export interface ReadmeQuality {
  length: number
  hasHeadings: boolean
  /** At least two distinct headings */
  hasSections: boolean
  headingCount: number
}

const HEADING_LINE = /^#{1,6}[ \t]+\S.*$/gm

/** Exact, case-sensitive lookup */
export function findRequiredFile(files: FileSet, name: string): string | null {
  return Object.prototype.hasOwnProperty.call(files, name) ? (files[name] ?? null) : null
}

export function isEmpty(content: string): boolean {
  return content.trim().length === 0
}

export function licenseIsMit(content: string): boolean {
  return content.toLowerCase().includes('mit')
}

export function readmeQuality(content: string): ReadmeQuality {
  const headings = (content.match(HEADING_LINE) ?? []).map(line => line.trim())
  const distinct = new Set(headings)
  return {
    length: content.length,
    hasHeadings: headings.length > 0,
    hasSections: distinct.size >= 2,
    headingCount: headings.length,
  }
}

export function meetsReadmeFloor(quality: ReadmeQuality): boolean {
  return quality.length > README_MIN_LENGTH && quality.hasHeadings
}

/** Names the floor deficiencies, empty when the floor holds */
export function describeReadmeIssues(quality: ReadmeQuality): string[] {
  const issues: string[] = []
  if (quality.length <= README_MIN_LENGTH) {
    issues.push(`too short (${quality.length} chars, need more than ${README_MIN_LENGTH})`)
  }
  if (!quality.hasHeadings) issues.push('missing headings')
  return issues
}
