/**
 * 检查分类器
 * 按顺序匹配规则，首个命中即返回；规则之间有重叠，顺序即优先级
 */

import type { CheckCategory } from '../types/check.js'

interface ClassificationRule {
  category: CheckCategory
  matches(lower: string, raw: string): boolean
}

const ELEMENT_ID_PATTERNS = [
  /\bid\s*=\s*["'`]?([\w-]+)/i,
  /\bid\s+["'`]([\w-]+)["'`]/i,
]

const VERSION_PATTERNS = [
  /bootstrap\s*v?(\d+(?:\.\d+)*)/i,
  /\bversion\s*v?(\d+(?:\.\d+)*)/i,
]

/** Element id named by the check text, e.g. "id='result'" → "result" */
export function extractElementId(text: string): string | null {
  for (const pattern of ELEMENT_ID_PATTERNS) {
    const id = pattern.exec(text)?.[1]
    if (id) return id
  }
  return null
}

/** Requested library version, e.g. "Bootstrap 5 from CDN" → "5" */
export function extractRequestedVersion(text: string): string | null {
  for (const pattern of VERSION_PATTERNS) {
    const version = pattern.exec(text)?.[1]
    if (version) return version
  }
  return null
}

const includesAny = (text: string, words: readonly string[]) => words.some(w => text.includes(w))

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    category: 'mit_license',
    matches: lower => lower.includes('mit') && lower.includes('license'),
  },
  {
    category: 'readme_quality',
    matches: lower => lower.includes('readme') && includesAny(lower, ['professional', 'complete', 'quality']),
  },
  {
    category: 'html_element_by_id',
    matches: (_lower, raw) => extractElementId(raw) !== null,
  },
  {
    category: 'cdn_script_presence',
    matches: lower => lower.includes('bootstrap') && includesAny(lower, ['cdn', 'load']),
  },
  {
    category: 'arithmetic_operations',
    matches: lower => includesAny(lower, ['arithmetic', 'calculat', 'operation']),
  },
]

/**
 * 分类检查文本，总是有结果（兜底 generic）
 */
export function classifyCheck(text: string): CheckCategory {
  const lower = text.toLowerCase()
  const rule = CLASSIFICATION_RULES.find(r => r.matches(lower, text))
  return rule ? rule.category : 'generic'
}
