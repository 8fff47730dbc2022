/**
 * Express HTTP Server
 *
 * 接收构建请求，交给后台 runner 处理
 */

import express, { type Express } from 'express'
import type { Server } from 'http'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { type Result, ok, err, fromPromise } from '../shared/result.js'
import { loadConfig, getServerConfig } from '../config/index.js'
import type { Generator, Publisher } from '../types/task.js'
import { createHttpClient, type HttpClient } from '../http/httpClient.js'
import { createTaskRunner, type TaskRunner } from '../task/createTaskRunner.js'
import { settingsFromConfig } from '../task/settings.js'
import { registerRoutes, type RouteContext } from './routes.js'

const logger = createLogger('server')

export const SERVER_VERSION = '1.0.0'

export function createApp(ctx: RouteContext): Express {
  const app = express()
  app.use(express.json({ limit: '10mb' }))
  registerRoutes(app, ctx)
  return app
}

export interface ServerOptions {
  generator: Generator
  publisher: Publisher
  http?: HttpClient
  port?: number
  host?: string
}

export interface RunningServer {
  server: Server
  runner: TaskRunner
  /** Stops accepting requests, cancels retry waits, waits for running tasks */
  close(): Promise<void>
}

/**
 * 启动 HTTP Server；缺少 secret 时返回配置错误，不影响库的其他用法
 */
export async function startServer(options: ServerOptions): Promise<Result<RunningServer, AppError>> {
  const serverConfig = await getServerConfig()
  if (!serverConfig.ok) return err(serverConfig.error)

  const config = await loadConfig()
  const port = options.port ?? serverConfig.value.port
  const host = options.host ?? serverConfig.value.host

  const runner = createTaskRunner({
    concurrency: config.tasks.concurrency,
    deps: {
      generator: options.generator,
      publisher: options.publisher,
      http: options.http ?? createHttpClient(),
      settings: settingsFromConfig(config),
    },
  })

  const { secret, email } = serverConfig.value
  const app = createApp({ secret, email, runner, version: SERVER_VERSION })
  const listening = await fromPromise(
    new Promise<Server>((resolve, reject) => {
      const s = app.listen(port, host, () => resolve(s))
      s.once('error', reject)
    })
  )

  if (!listening.ok) {
    await runner.shutdown()
    return err(AppError.configInvalid(`cannot listen on ${host}:${port}: ${listening.error.message}`))
  }
  const server = listening.value

  logger.info(`Listening on http://${host}:${port}`)

  return ok({
    server,
    runner,
    async close() {
      await new Promise<void>(resolve => server.close(() => resolve()))
      await runner.shutdown()
    },
  })
}
