/**
 * 单个构建任务的处理流程
 *
 * generate → static → requirements → publish → live → notify
 *
 * 每一步的失败都收敛到报告里，通知总会发出（除非回调地址本身非法）
 */

import type { BuildTask, Deployment, Generator, Publisher } from '../types/task.js'
import type { FileSet } from '../types/check.js'
import type { ValidationReport } from '../types/report.js'
import type { NotificationOutcome } from '../types/notification.js'
import type { HttpClient } from '../http/httpClient.js'
import type { Scheduler } from '../notify/scheduler.js'
import { fromPromise, type Result } from '../shared/result.js'
import { createLogger, logError, type Logger } from '../shared/logger.js'
import { runPrePublishValidation, completeValidation } from '../validation/runValidation.js'
import { buildNotificationPayload } from '../notify/buildPayload.js'
import { dispatchNotification } from '../notify/dispatchNotification.js'

const defaultLogger = createLogger('task')

export interface TaskSettings {
  pageTimeoutMs: number
  minPageBytes: number
  notifyTimeoutMs: number
  retryDelaysSeconds: readonly number[]
}

export interface TaskDeps {
  generator: Generator
  publisher: Publisher
  http: HttpClient
  settings: TaskSettings
  scheduler?: Scheduler
  logger?: Logger
}

export interface TaskOutcome {
  report: ValidationReport
  deployment: Deployment | null
  notification: NotificationOutcome
}

// Collaborators may throw before returning a promise
function settle<T>(call: () => Promise<T>): Promise<Result<T, Error>> {
  return fromPromise(Promise.resolve().then(call))
}

async function generateFiles(task: BuildTask, deps: TaskDeps, stageErrors: string[], log: Logger): Promise<FileSet | null> {
  log.info(`Step 1: ${task.round > 1 ? 'Updating' : 'Generating'} application for ${task.task}`)
  const generated = await settle(() => deps.generator.generate(task))
  if (generated.ok) return generated.value

  logError(log, 'Generation failed', generated.error, { taskId: task.task, stage: 'generate' })
  stageErrors.push(`generation stage fault: ${generated.error.message}`)
  return null
}

async function publishFiles(
  task: BuildTask,
  files: FileSet | null,
  deps: TaskDeps,
  stageErrors: string[],
  log: Logger
): Promise<Deployment | null> {
  if (files === null) {
    log.warn(`Skipping publish for ${task.task}: nothing was generated`)
    return null
  }

  log.info(`Step 2: Publishing ${Object.keys(files).length} files`)
  const published = await settle(() => deps.publisher.publish(task, files))
  if (published.ok) return published.value

  logError(log, 'Publish failed', published.error, { taskId: task.task, stage: 'publish' })
  stageErrors.push(`publish stage fault: ${published.error.message}`)
  return null
}

/**
 * Runs one task end to end. Resolves once the notification reached a
 * terminal state; never rejects.
 */
export async function processTask(task: BuildTask, deps: TaskDeps, signal?: AbortSignal): Promise<TaskOutcome> {
  const log = deps.logger ?? defaultLogger
  const { settings } = deps
  log.info(`Processing task: ${task.task} (round ${task.round})`)

  const collaboratorErrors: string[] = []
  const files = await generateFiles(task, deps, collaboratorErrors, log)

  const pending = runPrePublishValidation({ files, checks: task.checks }, { logger: log })
  const deployment = await publishFiles(task, files, deps, collaboratorErrors, log)

  const report = await completeValidation(
    { ...pending, stageErrors: [...collaboratorErrors, ...pending.stageErrors] },
    deployment?.pagesUrl ?? null,
    { http: deps.http, pageTimeoutMs: settings.pageTimeoutMs, minPageBytes: settings.minPageBytes },
    { logger: log }
  )

  log.info(`Step 3: Notifying ${task.evaluationUrl}`)
  const notification = await dispatchNotification(
    task.evaluationUrl,
    buildNotificationPayload(task, deployment, report),
    {
      http: deps.http,
      scheduler: deps.scheduler,
      retryDelaysSeconds: settings.retryDelaysSeconds,
      timeoutMs: settings.notifyTimeoutMs,
      signal,
      taskId: task.task,
      logger: log,
    }
  )

  if (notification.state === 'success') {
    log.info(`✓ Task ${task.task} completed successfully`)
  } else {
    log.error(`✗ Task ${task.task} completed but notification failed: ${notification.reason ?? 'unknown reason'}`)
  }

  return { report, deployment, notification }
}
