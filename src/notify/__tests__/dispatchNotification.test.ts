import { describe, it, expect } from 'vitest'
import { dispatchNotification, isValidCallbackUrl } from '../dispatchNotification.js'
import type { Scheduler } from '../scheduler.js'
import {
  FakeHttpClient,
  FakeScheduler,
  postFailure,
  postStatus,
  createRecordingLogger,
} from '../../../tests/helpers/index.js'

const CALLBACK = 'https://callback.example.com/notify'
const payload = { task: 'sum-page-1', round: 1 }

describe('dispatchNotification', () => {
  it('delivers on the first 2xx', async () => {
    const http = new FakeHttpClient().queuePosts(postStatus(204))
    const scheduler = new FakeScheduler()
    const outcome = await dispatchNotification(CALLBACK, payload, { http, scheduler })

    expect(outcome).toEqual({
      state: 'success',
      attempts: [{ attemptNumber: 1, scheduledDelaySeconds: 0, outcome: 'success', statusCode: 204 }],
    })
    expect(http.posts).toEqual([{ url: CALLBACK, payload, timeoutMs: 15_000 }])
    expect(scheduler.delays).toEqual([])
  })

  it('retries with 1,2,4,8 second waits and succeeds on the fifth attempt', async () => {
    const http = new FakeHttpClient().queuePosts(postStatus(500), postStatus(500), postStatus(500), postStatus(500))
    const scheduler = new FakeScheduler()
    const outcome = await dispatchNotification(CALLBACK, payload, { http, scheduler })

    expect(outcome.state).toBe('success')
    expect(outcome.attempts).toHaveLength(5)
    expect(http.posts).toHaveLength(5)
    expect(scheduler.delays).toEqual([1000, 2000, 4000, 8000])
    expect(outcome.attempts.map(a => a.scheduledDelaySeconds)).toEqual([0, 1, 2, 4, 8])
    expect(outcome.attempts.map(a => a.outcome)).toEqual([
      'transient_failure',
      'transient_failure',
      'transient_failure',
      'transient_failure',
      'success',
    ])
    expect(outcome.attempts[0]).toEqual({
      attemptNumber: 1,
      scheduledDelaySeconds: 0,
      outcome: 'transient_failure',
      statusCode: 500,
      error: 'HTTP 500',
    })
  })

  it('abandons after six failed attempts', async () => {
    const http = new FakeHttpClient()
    http.defaultPost = postStatus(503)
    const scheduler = new FakeScheduler()
    const logger = createRecordingLogger()
    const outcome = await dispatchNotification(CALLBACK, payload, { http, scheduler, logger, taskId: 'sum-page-1' })

    expect(outcome.state).toBe('abandoned')
    expect(outcome.attempts).toHaveLength(6)
    expect(scheduler.delays).toEqual([1000, 2000, 4000, 8000, 16000])
    expect(outcome.attempts[5]?.outcome).toBe('abandoned')
    expect(outcome.reason).toBe('Retry budget exhausted after 6 attempts, last error: HTTP 503')
    expect(logger.messages('error')).toEqual([
      'Notification abandoned: Retry budget exhausted after 6 attempts, last error: HTTP 503',
    ])
  })

  it('retries network errors and timeouts too', async () => {
    const http = new FakeHttpClient().queuePosts(postFailure('connection reset'))
    const outcome = await dispatchNotification(CALLBACK, payload, { http, scheduler: new FakeScheduler() })

    expect(outcome.state).toBe('success')
    expect(outcome.attempts[0]).toEqual({
      attemptNumber: 1,
      scheduledDelaySeconds: 0,
      outcome: 'transient_failure',
      statusCode: undefined,
      error: 'connection reset',
    })
  })

  it('retries non-2xx client responses', async () => {
    const http = new FakeHttpClient().queuePosts(postStatus(404))
    const outcome = await dispatchNotification(CALLBACK, payload, { http, scheduler: new FakeScheduler() })
    expect(outcome.attempts.map(a => a.statusCode)).toEqual([404, 200])
  })

  it('abandons a malformed callback URL without sending', async () => {
    const http = new FakeHttpClient()
    const outcome = await dispatchNotification('not a url', payload, { http, scheduler: new FakeScheduler() })

    expect(outcome).toEqual({ state: 'abandoned', attempts: [], reason: 'Malformed callback URL: not a url' })
    expect(http.posts).toEqual([])
  })

  it('honours a custom retry budget', async () => {
    const http = new FakeHttpClient()
    http.defaultPost = postStatus(500)
    const outcome = await dispatchNotification(CALLBACK, payload, {
      http,
      scheduler: new FakeScheduler(),
      retryDelaysSeconds: [],
      timeoutMs: 500,
    })

    expect(outcome.attempts).toHaveLength(1)
    expect(outcome.reason).toBe('Retry budget exhausted after 1 attempts, last error: HTTP 500')
    expect(http.posts[0]?.timeoutMs).toBe(500)
  })

  it('abandons when cancelled before the first attempt', async () => {
    const controller = new AbortController()
    controller.abort()
    const http = new FakeHttpClient()
    const outcome = await dispatchNotification(CALLBACK, payload, {
      http,
      scheduler: new FakeScheduler(),
      signal: controller.signal,
    })

    expect(outcome.reason).toBe('Cancelled before first attempt')
    expect(http.posts).toEqual([])
  })

  it('abandons when cancelled during a retry wait', async () => {
    const controller = new AbortController()
    const scheduler: Scheduler = {
      async delay() {
        controller.abort()
        return 'cancelled'
      },
    }
    const http = new FakeHttpClient().queuePosts(postStatus(502))
    const outcome = await dispatchNotification(CALLBACK, payload, { http, scheduler, signal: controller.signal })

    expect(outcome.state).toBe('abandoned')
    expect(outcome.reason).toBe('Cancelled while waiting to retry')
    expect(outcome.attempts).toHaveLength(1)
    expect(http.posts).toHaveLength(1)
  })
})

describe('isValidCallbackUrl', () => {
  it('accepts absolute http(s) URLs only', () => {
    expect(isValidCallbackUrl('https://callback.example.com/notify')).toBe(true)
    expect(isValidCallbackUrl('http://localhost:9000/cb')).toBe(true)
    expect(isValidCallbackUrl('ftp://files.example.com')).toBe(false)
    expect(isValidCallbackUrl('/relative/path')).toBe(false)
    expect(isValidCallbackUrl('')).toBe(false)
  })
})
