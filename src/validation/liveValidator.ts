/**
 * 线上页面校验
 * 拉取页面 → 失败即停 → 复用结构类检查评估器 → 扫描错误横幅（仅警告）
 */

import type { CheckSpec } from '../types/check.js'
import type { LiveResult, PageInfo } from '../types/report.js'
import type { HttpClient } from '../http/httpClient.js'
import { isSuccessStatus } from '../http/httpClient.js'
import { createPageEvidence } from '../evidence/evidence.js'
import { countElements, getTitle, renderedText } from '../evidence/html.js'
import { detectErrorBanners } from '../evidence/banners.js'
import { evaluateLiveChecks } from '../checks/matchCheck.js'

export interface LiveValidationOptions {
  http: HttpClient
  timeoutMs: number
  /** Pages smaller than this get a warning */
  minPageBytes?: number
}

export const NO_RESPONSE_STATUS = -1

function failed(url: string, pageInfo: PageInfo, error: string): LiveResult {
  return { passed: false, url, pageInfo, errors: [error], warnings: [], checks: [] }
}

export async function validateLive(
  url: string,
  checks: readonly CheckSpec[],
  options: LiveValidationOptions
): Promise<LiveResult> {
  const { http, timeoutMs, minPageBytes = 100 } = options
  const startedAt = Date.now()
  const response = await http.get(url, timeoutMs)

  if (!response.ok) {
    const pageInfo: PageInfo = {
      statusCode: NO_RESPONSE_STATUS,
      responseTimeMs: Date.now() - startedAt,
      htmlSizeBytes: 0,
    }
    const message =
      response.error.code === 'ERR_TIMEOUT'
        ? `Page request timed out after ${timeoutMs}ms`
        : `Failed to fetch page: ${response.error.message}`
    return failed(url, pageInfo, message)
  }

  const { statusCode, body, elapsedMs } = response.value
  const pageInfo: PageInfo = {
    statusCode,
    responseTimeMs: elapsedMs,
    htmlSizeBytes: Buffer.byteLength(body, 'utf8'),
  }

  if (!isSuccessStatus(statusCode)) {
    return failed(url, pageInfo, `Page returned HTTP ${statusCode}`)
  }
  if (body.trim().length === 0) {
    return failed(url, pageInfo, 'Page body is empty')
  }

  const evidence = createPageEvidence(body)
  const errors: string[] = []
  const warnings: string[] = []

  const parsed = evidence.indexDocument()
  if (parsed) {
    pageInfo.title = getTitle(parsed.document)
    pageInfo.scriptsCount = countElements(parsed.document, 'script')
    pageInfo.linksCount = countElements(parsed.document, 'link')
    if (parsed.fault) warnings.push(parsed.fault.message)
  }

  const liveChecks = evaluateLiveChecks(evidence, checks)
  for (const result of liveChecks) {
    if (!result.passed) errors.push(`Live check failed: ${result.spec.rawText}: ${result.detail}`)
  }

  if (pageInfo.htmlSizeBytes < minPageBytes) {
    warnings.push(`Page HTML is very short (${pageInfo.htmlSizeBytes} bytes)`)
  }
  // Runs last: strips scripts from the parsed document
  const visibleText = parsed ? renderedText(parsed.document) : ''
  for (const banner of detectErrorBanners(visibleText)) {
    warnings.push(`Possible error banner on page: "${banner}"`)
  }

  return { passed: errors.length === 0, url, pageInfo, errors, warnings, checks: liveChecks }
}
