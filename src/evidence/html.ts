/**
 * HTML 证据提取
 * 基于 linkedom 构建 DOM；解析失败时退化为空文档，不向上抛出
 */

import { parseHTML } from 'linkedom'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'

export interface HtmlElementLike {
  readonly tagName: string
  readonly textContent: string | null
  getAttribute(name: string): string | null
  remove(): void
}

export interface HtmlDocument {
  querySelector(selectors: string): HtmlElementLike | null
  querySelectorAll(selectors: string): ArrayLike<HtmlElementLike>
}

export interface ParsedHtml {
  document: HtmlDocument
  /** Set when the parser failed and the document is an empty stand-in */
  fault: AppError | null
}

export interface ElementLookup {
  found: boolean
  tagName: string | null
}

export interface CdnLookup {
  /** Library (and requested version, if any) matched */
  found: boolean
  /** A CDN URL for the library exists, whatever its version */
  libraryFound: boolean
  matchedVersion: string | null
  url: string | null
}

const EMPTY_PAGE = '<!DOCTYPE html><html><head></head><body></body></html>'

const CDN_HOSTS = [
  'cdn.jsdelivr.net',
  'unpkg.com',
  'cdnjs.cloudflare.com',
  'cdn.bootstrapcdn.com',
  'stackpath.bootstrapcdn.com',
  'maxcdn.bootstrapcdn.com',
  'ajax.googleapis.com',
  'code.jquery.com',
  'getbootstrap.com',
]

function toDocument(html: string): HtmlDocument {
  // Fragments without an <html> root are wrapped so lookups see a full tree
  const source = /<html[\s>]/i.test(html) ? html : `<!DOCTYPE html><html><head></head><body>${html}</body></html>`
  return parseHTML(source).document
}

export function parseHtml(content: string): ParsedHtml {
  try {
    return { document: toDocument(content), fault: null }
  } catch (error) {
    return {
      document: parseHTML(EMPTY_PAGE).document,
      fault: AppError.evidence(`HTML parse failed: ${getErrorMessage(error)}`, error),
    }
  }
}

export function findElementById(doc: HtmlDocument, id: string): ElementLookup {
  const candidates = Array.from(doc.querySelectorAll('[id]'))
  const match = candidates.find(el => el.getAttribute('id') === id)
  return match ? { found: true, tagName: match.tagName.toLowerCase() } : { found: false, tagName: null }
}

/** src of every script and href of every link, in document order per kind */
export function collectResourceUrls(doc: HtmlDocument): string[] {
  const scripts = Array.from(doc.querySelectorAll('script[src]')).map(el => el.getAttribute('src'))
  const links = Array.from(doc.querySelectorAll('link[href]')).map(el => el.getAttribute('href'))
  return [...scripts, ...links].filter((url): url is string => typeof url === 'string' && url.length > 0)
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function isCdnUrl(url: string): boolean {
  const lower = url.toLowerCase()
  if (!/^(https?:)?\/\//.test(lower)) return false
  return CDN_HOSTS.some(host => lower.includes(host)) || /\/\/[^/]*cdn[^/]*\//.test(lower)
}

// <lib>.min.js / <lib>.min.css, wherever it is served from
function isMinifiedBuild(url: string, lib: string): boolean {
  return new RegExp(`(^|/)${escapeRegExp(lib)}\\.min\\.(js|css)([?#]|$)`).test(url.toLowerCase())
}

export function extractLibraryVersion(url: string, library: string): string | null {
  const pattern = new RegExp(`${escapeRegExp(library.toLowerCase())}[@/-]v?(\\d+(?:\\.\\d+)*)`)
  return pattern.exec(url.toLowerCase())?.[1] ?? null
}

function versionMatches(actual: string | null, requested: string): boolean {
  if (!actual) return false
  return actual === requested || actual.startsWith(`${requested}.`)
}

export function findCdnLink(doc: HtmlDocument, library: string, version: string | null): CdnLookup {
  const lib = library.toLowerCase()
  const candidates = collectResourceUrls(doc)
    .filter(url => (isCdnUrl(url) && url.toLowerCase().includes(lib)) || isMinifiedBuild(url, lib))
    .map(url => ({ url, version: extractLibraryVersion(url, lib) }))

  const first = candidates[0]
  if (!first) {
    return { found: false, libraryFound: false, matchedVersion: null, url: null }
  }

  if (version === null) {
    return { found: true, libraryFound: true, matchedVersion: first.version, url: first.url }
  }

  const exact = candidates.find(c => versionMatches(c.version, version))
  if (exact) {
    return { found: true, libraryFound: true, matchedVersion: exact.version, url: exact.url }
  }
  return { found: false, libraryFound: true, matchedVersion: first.version, url: first.url }
}

export function getTitle(doc: HtmlDocument): string | null {
  const text = doc.querySelector('title')?.textContent?.trim()
  return text ? text : null
}

export function countElements(doc: HtmlDocument, selector: string): number {
  return doc.querySelectorAll(selector).length
}

/**
 * Visible text of the page, whitespace collapsed. Script and style elements
 * are removed from `doc` first.
 */
export function renderedText(doc: HtmlDocument): string {
  for (const el of Array.from(doc.querySelectorAll('script, style'))) el.remove()
  return (doc.querySelector('html')?.textContent ?? '').replace(/\s+/g, ' ').trim()
}
