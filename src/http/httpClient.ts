/**
 * HTTP 能力封装
 * 基于平台 fetch，带超时；所有失败都以 Result 返回，不抛出
 */

import { type Result, ok, err } from '../shared/result.js'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'

export interface GetResponse {
  statusCode: number
  body: string
  elapsedMs: number
}

export interface PostResponse {
  statusCode: number
  elapsedMs: number
}

export interface HttpClient {
  get(url: string, timeoutMs: number): Promise<Result<GetResponse, AppError>>
  post(url: string, payload: unknown, timeoutMs: number): Promise<Result<PostResponse, AppError>>
}

export interface HttpClientOptions {
  userAgent?: string
  /** Injected for tests */
  fetchImpl?: typeof fetch
}

const DEFAULT_USER_AGENT = 'artifact-verifier/1.0 (Validation Bot)'

async function withTimeout<T>(
  url: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<Result<T, AppError>> {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
  try {
    return ok(await run(controller.signal))
  } catch (error) {
    if (controller.signal.aborted) return err(AppError.timeout(timeoutMs, url))
    return err(AppError.network(`Request to ${url} failed: ${getErrorMessage(error)}`, error))
  } finally {
    clearTimeout(timeoutId)
  }
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const { userAgent = DEFAULT_USER_AGENT, fetchImpl = fetch } = options

  return {
    get(url, timeoutMs) {
      const startedAt = Date.now()
      return withTimeout(url, timeoutMs, async signal => {
        const response = await fetchImpl(url, {
          method: 'GET',
          redirect: 'follow',
          headers: { 'User-Agent': userAgent },
          signal,
        })
        const body = await response.text()
        return { statusCode: response.status, body, elapsedMs: Date.now() - startedAt }
      })
    },

    post(url, payload, timeoutMs) {
      const startedAt = Date.now()
      return withTimeout(url, timeoutMs, async signal => {
        const response = await fetchImpl(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', 'User-Agent': userAgent },
          body: JSON.stringify(payload),
          signal,
        })
        // Drain so the connection can be reused
        await response.arrayBuffer()
        return { statusCode: response.status, elapsedMs: Date.now() - startedAt }
      })
    },
  }
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300
}
