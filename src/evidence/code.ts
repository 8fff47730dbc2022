/**
 * Best-effort script inspection. Not a parser: comments and string literals
 * are blanked out first, then a few token patterns are looked for.
 */

import type { FileSet } from '../types/check.js'

export interface ArithmeticAnalysis {
  hasFunctions: boolean
  hasOperators: boolean
}

const SCRIPT_FILE = /\.(m?js|cjs)$/i
const HTML_FILE = /\.html?$/i
const INLINE_SCRIPT = /<script\b([^>]*)>([\s\S]*?)<\/script>/gi

// Leftmost alternative wins, so a quote inside a comment never opens a string
const COMMENT_OR_STRING = /\/\*[\s\S]*?\*\/|\/\/[^\n]*|"(?:\\.|[^"\\\n])*"|'(?:\\.|[^'\\\n])*'|`(?:\\.|[^`\\])*`/g

const FUNCTION_PATTERNS = [
  /\bfunction\b\s*[\w$]*\s*\(/,
  /=>/,
  /\b(?:const|let|var)\s+[\w$]+\s*=\s*(?:async\s*)?\(/,
  /^\s*(?!(?:if|for|while|switch|catch|return)\b)[A-Za-z_$][\w$]*\s*\([^)]*\)\s*\{/m,
]

const OPERATOR_PATTERNS = [
  /[\w$)\]]\s*[+\-*/]\s*[\w$(.]/,
  /[\w$)\]]\s*[+\-*/]=/,
]

export function stripCommentsAndStrings(code: string): string {
  return code.replace(COMMENT_OR_STRING, ' ')
}

export function analyzeArithmeticCode(content: string): ArithmeticAnalysis {
  const code = stripCommentsAndStrings(content)
  return {
    hasFunctions: FUNCTION_PATTERNS.some(p => p.test(code)),
    hasOperators: OPERATOR_PATTERNS.some(p => p.test(code)),
  }
}

export function detectArithmeticCode(content: string): boolean {
  const { hasFunctions, hasOperators } = analyzeArithmeticCode(content)
  return hasFunctions && hasOperators
}

/** Inline <script> bodies; external scripts (with src) are skipped */
export function extractInlineScripts(html: string): string[] {
  const bodies: string[] = []
  for (const match of html.matchAll(INLINE_SCRIPT)) {
    const attrs = match[1] ?? ''
    const body = match[2] ?? ''
    if (/\bsrc\s*=/i.test(attrs) || body.trim().length === 0) continue
    bodies.push(body)
  }
  return bodies
}

/** All script code of the artifact: .js files plus inline scripts of .html files */
export function collectScriptSources(files: FileSet): string {
  const parts: string[] = []
  for (const [name, content] of Object.entries(files)) {
    if (SCRIPT_FILE.test(name)) {
      parts.push(content)
    } else if (HTML_FILE.test(name)) {
      parts.push(...extractInlineScripts(content))
    }
  }
  return parts.join('\n')
}
