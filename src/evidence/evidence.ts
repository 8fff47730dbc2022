import type { FileSet } from '../types/check.js'
import { findRequiredFile } from './files.js'
import { parseHtml, type ParsedHtml } from './html.js'
import { collectScriptSources, extractInlineScripts } from './code.js'

export const INDEX_FILE = 'index.html'

/**
 * What an evaluator may look at. Static evidence comes from the generated
 * files; page evidence from one fetched HTML document.
 */
export interface Evidence {
  readonly source: 'files' | 'page'
  file(name: string): string | null
  /** Parsed index page, null when there is none */
  indexDocument(): ParsedHtml | null
  scriptSources(): string
  /** Everything, concatenated, for keyword search */
  allContent(): string
}

export function createFileEvidence(files: FileSet): Evidence {
  let parsed: ParsedHtml | null | undefined

  return {
    source: 'files',
    file(name) {
      return findRequiredFile(files, name)
    },
    indexDocument() {
      if (parsed === undefined) {
        const html = findRequiredFile(files, INDEX_FILE)
        parsed = html === null ? null : parseHtml(html)
      }
      return parsed
    },
    scriptSources() {
      return collectScriptSources(files)
    },
    allContent() {
      return Object.values(files).join('\n')
    },
  }
}

export function createPageEvidence(html: string): Evidence {
  let parsed: ParsedHtml | undefined

  return {
    source: 'page',
    file(name) {
      return name === INDEX_FILE ? html : null
    },
    indexDocument() {
      parsed ??= parseHtml(html)
      return parsed
    },
    scriptSources() {
      return extractInlineScripts(html).join('\n')
    },
    allContent() {
      return html
    },
  }
}
