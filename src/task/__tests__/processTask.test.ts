import { describe, it, expect } from 'vitest'
import { processTask, type TaskDeps } from '../processTask.js'
import { settingsFromConfig } from '../settings.js'
import { getDefaultConfig } from '../../config/loadConfig.js'
import { NO_FILES_ERROR } from '../../validation/staticValidator.js'
import type { NotificationPayload } from '../../types/notification.js'
import { toWireReport } from '../../notify/buildPayload.js'
import {
  FakeHttpClient,
  FakeScheduler,
  INDEX_HTML,
  SAMPLE_DEPLOYMENT,
  failingGenerator,
  failingPublisher,
  sampleArtifact,
  sampleTask,
  staticGenerator,
  staticPublisher,
} from '../../../tests/helpers/index.js'

const PAGES_URL = 'https://pages.example.com/sum-page-1/'

function makeDeps(overrides: Partial<TaskDeps> = {}): TaskDeps & { http: FakeHttpClient } {
  const http = new FakeHttpClient().servePage(PAGES_URL, INDEX_HTML)
  return {
    generator: staticGenerator(sampleArtifact()),
    publisher: staticPublisher(SAMPLE_DEPLOYMENT),
    settings: settingsFromConfig(getDefaultConfig()),
    scheduler: new FakeScheduler(),
    ...overrides,
    http,
  }
}

function isPayload(value: unknown): value is NotificationPayload {
  return typeof value === 'object' && value !== null && 'validation' in value
}

function sentPayload(http: FakeHttpClient): NotificationPayload {
  const payload = http.posts[0]?.payload
  if (!isPayload(payload)) throw new Error('no notification was sent')
  return payload
}

describe('processTask', () => {
  it('generates, validates, publishes and notifies', async () => {
    const publisher = staticPublisher(SAMPLE_DEPLOYMENT)
    const deps = makeDeps({ publisher })
    const task = sampleTask()

    const outcome = await processTask(task, deps)

    expect(publisher.published).toHaveLength(1)
    expect(outcome.deployment).toEqual(SAMPLE_DEPLOYMENT)
    expect(outcome.report.staticResult.passed).toBe(true)
    expect(outcome.report.checksResult.passedCount).toBe(3)
    expect(outcome.report.liveResult?.passed).toBe(true)
    expect(outcome.notification.state).toBe('success')
    expect(deps.http.gets).toEqual([PAGES_URL])
    expect(deps.http.posts[0]?.url).toBe(task.evaluationUrl)
    expect(sentPayload(deps.http).pages_url).toBe(PAGES_URL)
  })

  it('reports a generation failure and still notifies', async () => {
    const publisher = staticPublisher(SAMPLE_DEPLOYMENT)
    const deps = makeDeps({ generator: failingGenerator('model unavailable'), publisher })

    const outcome = await processTask(sampleTask(), deps)

    expect(outcome.report.stageErrors).toEqual(['generation stage fault: model unavailable'])
    expect(outcome.report.staticResult.errors).toEqual([NO_FILES_ERROR])
    expect(outcome.report.checksResult.passedCount).toBe(0)
    expect(outcome.deployment).toBeNull()
    expect(publisher.published).toEqual([])
    expect(outcome.notification.state).toBe('success')
    expect(sentPayload(deps.http).repo_url).toBe('')
  })

  it('reports a publish failure, skips live validation and still notifies', async () => {
    const deps = makeDeps({ publisher: failingPublisher('push rejected') })

    const outcome = await processTask(sampleTask(), deps)

    expect(outcome.report.stageErrors).toEqual(['publish stage fault: push rejected'])
    expect(outcome.report.checksResult.passedCount).toBe(3)
    expect(outcome.report.liveResult).toBeNull()
    expect(deps.http.gets).toEqual([])
    expect(outcome.notification.state).toBe('success')
  })

  it('treats a generator that throws synchronously as a generation failure', async () => {
    const generator = {
      generate: () => {
        throw new Error('quota exceeded')
      },
    }
    const deps = makeDeps({ generator })

    const outcome = await processTask(sampleTask(), deps)

    expect(outcome.report.stageErrors).toEqual(['generation stage fault: quota exceeded'])
    expect(outcome.report.staticResult.errors).toEqual([NO_FILES_ERROR])
    expect(outcome.notification.state).toBe('success')
    expect(deps.http.posts).toHaveLength(1)
  })

  it('treats a publisher that throws synchronously as a publish failure', async () => {
    const publisher = {
      publish: () => {
        throw new Error('token revoked')
      },
    }
    const deps = makeDeps({ publisher })

    const outcome = await processTask(sampleTask(), deps)

    expect(outcome.report.stageErrors).toEqual(['publish stage fault: token revoked'])
    expect(outcome.report.liveResult).toBeNull()
    expect(deps.http.posts).toHaveLength(1)
  })

  it('resolves even when the notification is abandoned', async () => {
    const deps = makeDeps()
    const outcome = await processTask(sampleTask({ evaluationUrl: 'not a url' }), deps)

    expect(outcome.notification.state).toBe('abandoned')
    expect(outcome.notification.reason).toBe('Malformed callback URL: not a url')
    expect(outcome.report.staticResult.passed).toBe(true)
  })

  it('sends the full report in the payload', async () => {
    const deps = makeDeps()
    const outcome = await processTask(sampleTask(), deps)
    const { validation } = sentPayload(deps.http)
    expect(validation).toEqual(toWireReport(outcome.report))
    expect(validation.checks_result.passed_count).toBe(3)
    expect(validation.live_result?.page_info.status_code).toBe(200)
  })
})
