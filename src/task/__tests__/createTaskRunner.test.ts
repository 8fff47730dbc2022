import { describe, it, expect } from 'vitest'
import { createTaskRunner } from '../createTaskRunner.js'
import type { TaskDeps, TaskOutcome } from '../processTask.js'
import type { BuildTask, FileSet } from '../../types/index.js'
import { settingsFromConfig } from '../settings.js'
import { getDefaultConfig } from '../../config/loadConfig.js'
import {
  FakeHttpClient,
  FakeScheduler,
  SAMPLE_DEPLOYMENT,
  abortableScheduler,
  createDeferred,
  postStatus,
  sampleArtifact,
  sampleTask,
  staticGenerator,
  staticPublisher,
} from '../../../tests/helpers/index.js'

function makeDeps(overrides: Partial<TaskDeps> = {}): TaskDeps {
  return {
    generator: staticGenerator(sampleArtifact()),
    // no pages URL, so no live fetch
    publisher: staticPublisher({ ...SAMPLE_DEPLOYMENT, pagesUrl: null }),
    http: new FakeHttpClient(),
    settings: settingsFromConfig(getDefaultConfig()),
    scheduler: new FakeScheduler(),
    ...overrides,
  }
}

describe('createTaskRunner', () => {
  it('runs submitted tasks in the background', async () => {
    const completed: Array<[BuildTask, TaskOutcome]> = []
    const runner = createTaskRunner({ deps: makeDeps(), onComplete: (task, outcome) => completed.push([task, outcome]) })

    expect(runner.submit(sampleTask({ task: 'a' }))).toBe(true)
    expect(runner.submit(sampleTask({ task: 'b' }))).toBe(true)
    await runner.drain()

    expect(completed.map(([task]) => task.task).sort()).toEqual(['a', 'b'])
    expect(completed.every(([, outcome]) => outcome.notification.state === 'success')).toBe(true)
    expect(runner.runningCount()).toBe(0)
    expect(runner.queuedCount()).toBe(0)
  })

  it('drains at once when idle', async () => {
    const runner = createTaskRunner({ deps: makeDeps() })
    await expect(runner.drain()).resolves.toBeUndefined()
  })

  it('limits concurrency', async () => {
    const gate = createDeferred()
    const files: FileSet = sampleArtifact()
    const runner = createTaskRunner({
      concurrency: 1,
      deps: makeDeps({
        generator: {
          generate: async () => {
            await gate.promise
            return files
          },
        },
      }),
    })

    runner.submit(sampleTask({ task: 'a' }))
    runner.submit(sampleTask({ task: 'b' }))
    expect(runner.runningCount()).toBe(1)
    expect(runner.queuedCount()).toBe(1)

    gate.resolve()
    await runner.drain()
    expect(runner.runningCount()).toBe(0)
  })

  it('drops queued tasks on shutdown and rejects new ones', async () => {
    const gate = createDeferred()
    const files: FileSet = sampleArtifact()
    const completed: string[] = []
    const runner = createTaskRunner({
      concurrency: 1,
      onComplete: task => completed.push(task.task),
      deps: makeDeps({
        generator: {
          generate: async () => {
            await gate.promise
            return files
          },
        },
      }),
    })

    runner.submit(sampleTask({ task: 'a' }))
    runner.submit(sampleTask({ task: 'b' }))

    const stopping = runner.shutdown()
    expect(runner.status()).toBe('stopping')
    expect(runner.submit(sampleTask({ task: 'c' }))).toBe(false)

    gate.resolve()
    expect(await stopping).toBe(1)
    expect(runner.status()).toBe('stopped')
    expect(completed).toEqual(['a'])
  })

  it('cancels pending retry waits on shutdown', async () => {
    const waiting = createDeferred()
    const http = new FakeHttpClient()
    http.defaultPost = postStatus(500)
    const outcomes: TaskOutcome[] = []
    const runner = createTaskRunner({
      deps: makeDeps({ http, scheduler: abortableScheduler(() => waiting.resolve()) }),
      onComplete: (_task, outcome) => outcomes.push(outcome),
    })

    runner.submit(sampleTask())
    await waiting.promise
    await runner.shutdown()

    expect(outcomes).toHaveLength(1)
    expect(outcomes[0]?.notification.state).toBe('abandoned')
    expect(outcomes[0]?.notification.reason).toBe('Cancelled while waiting to retry')
    expect(http.posts).toHaveLength(1)
  })
})
