/**
 * @entry Evidence 证据提取模块
 *
 * 纯函数，无 I/O：
 * - files: findRequiredFile/isEmpty/licenseIsMit/readmeQuality
 * - html: parseHtml/findElementById/findCdnLink/renderedText
 * - code: collectScriptSources/detectArithmeticCode
 * - keywords: extractKeywords
 * - banners: detectErrorBanners
 * - evidence: createFileEvidence/createPageEvidence（供检查评估器使用的统一视图）
 */

export {
  type ReadmeQuality,
  README_MIN_LENGTH,
  findRequiredFile,
  isEmpty,
  licenseIsMit,
  readmeQuality,
  meetsReadmeFloor,
  describeReadmeIssues,
} from './files.js'

export {
  type HtmlDocument,
  type HtmlElementLike,
  type ParsedHtml,
  type ElementLookup,
  type CdnLookup,
  parseHtml,
  findElementById,
  findCdnLink,
  collectResourceUrls,
  extractLibraryVersion,
  getTitle,
  countElements,
  renderedText,
} from './html.js'

export {
  type ArithmeticAnalysis,
  analyzeArithmeticCode,
  detectArithmeticCode,
  stripCommentsAndStrings,
  extractInlineScripts,
  collectScriptSources,
} from './code.js'

export { extractKeywords } from './keywords.js'
export { ERROR_BANNERS, detectErrorBanners } from './banners.js'
export { type Evidence, createFileEvidence, createPageEvidence } from './evidence.js'
