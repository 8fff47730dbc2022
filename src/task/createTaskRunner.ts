/**
 * 后台任务执行器
 * 每个任务是独立的工作单元，互不共享可变状态；并发数受限，
 * shutdown 时取消所有重试等待，已算出的校验结果不丢
 */

import type { BuildTask } from '../types/task.js'
import { createLogger, logError } from '../shared/logger.js'
import { ensureError } from '../shared/assertError.js'
import { processTask, type TaskDeps, type TaskOutcome } from './processTask.js'

const logger = createLogger('runner')

export type RunnerStatus = 'running' | 'stopping' | 'stopped'

export interface TaskRunnerOptions {
  deps: TaskDeps
  concurrency?: number
  /** Called once per task that ran to completion */
  onComplete?: (task: BuildTask, outcome: TaskOutcome) => void
}

export interface TaskRunner {
  /** Queue a task; returns at once */
  submit(task: BuildTask): boolean
  /** Resolves when nothing is queued or running */
  drain(): Promise<void>
  /** Cancels retry waits, drops queued tasks, waits for running ones */
  shutdown(): Promise<number>
  status(): RunnerStatus
  runningCount(): number
  queuedCount(): number
}

export function createTaskRunner(options: TaskRunnerOptions): TaskRunner {
  const { deps, concurrency = 4, onComplete } = options
  const queue: BuildTask[] = []
  const inFlight = new Set<Promise<void>>()
  const controller = new AbortController()
  let currentStatus: RunnerStatus = 'running'
  let idleWaiters: Array<() => void> = []

  function notifyIdle(): void {
    if (queue.length > 0 || inFlight.size > 0) return
    const waiters = idleWaiters
    idleWaiters = []
    for (const resolve of waiters) resolve()
  }

  async function runOne(task: BuildTask): Promise<void> {
    try {
      const outcome = await processTask(task, deps, controller.signal)
      onComplete?.(task, outcome)
    } catch (error) {
      logError(logger, `Task ${task.task} crashed`, ensureError(error), { taskId: task.task })
    }
  }

  function pump(): void {
    while (currentStatus === 'running' && inFlight.size < concurrency && queue.length > 0) {
      const task = queue.shift()
      if (!task) break
      const running: Promise<void> = runOne(task).finally(() => {
        inFlight.delete(running)
        pump()
        notifyIdle()
      })
      inFlight.add(running)
    }
  }

  return {
    submit(task) {
      if (currentStatus !== 'running') {
        logger.warn(`Runner is ${currentStatus}, rejecting task ${task.task}`)
        return false
      }
      queue.push(task)
      logger.debug(`Queued task ${task.task} (${queue.length} waiting)`)
      pump()
      return true
    },

    drain() {
      if (queue.length === 0 && inFlight.size === 0) return Promise.resolve()
      return new Promise(resolve => {
        idleWaiters.push(resolve)
      })
    },

    async shutdown() {
      if (currentStatus === 'stopped') return 0
      currentStatus = 'stopping'
      const dropped = queue.splice(0, queue.length)
      if (dropped.length > 0) {
        logger.warn(`Dropping ${dropped.length} queued task(s) on shutdown`)
      }
      controller.abort()
      await Promise.allSettled([...inFlight])
      currentStatus = 'stopped'
      notifyIdle()
      logger.info('Task runner stopped')
      return dropped.length
    },

    status() {
      return currentStatus
    },

    runningCount() {
      return inFlight.size
    },

    queuedCount() {
      return queue.length
    },
  }
}
