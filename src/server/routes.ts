/**
 * API route definitions
 */

import type { Express, NextFunction, Request, Response } from 'express'
import { timingSafeEqual } from 'crypto'
import { createLogger } from '../shared/logger.js'
import type { TaskRunner } from '../task/createTaskRunner.js'
import { buildRequestSchema, toBuildTask } from './buildRequest.js'

const logger = createLogger('server')

export interface RouteContext {
  secret: string
  /** Only requests for this email are accepted, when set */
  email?: string
  runner: Pick<TaskRunner, 'submit'>
  version: string
}

function secretMatches(expected: string, given: string): boolean {
  const a = Buffer.from(expected)
  const b = Buffer.from(given)
  return a.length === b.length && timingSafeEqual(a, b)
}

export function registerRoutes(app: Express, ctx: RouteContext): void {
  const health = (_req: Request, res: Response) => {
    res.json({ status: 'healthy', version: ctx.version })
  }

  // GET / 与 /health - 健康检查
  app.get('/', health)
  app.get('/health', health)

  // POST /api/build - 接收任务，立即返回，后台处理
  app.post('/api/build', (req: Request, res: Response) => {
    const parsed = buildRequestSchema.safeParse(req.body)
    if (!parsed.success) {
      logger.warn('Invalid build request', parsed.error.issues)
      res.status(422).json({
        detail: parsed.error.issues,
        hint: "Ensure Content-Type is 'application/json' and body is a JSON object",
      })
      return
    }

    if (ctx.email !== undefined && parsed.data.email !== ctx.email) {
      logger.warn(`Email mismatch for task ${parsed.data.task}: ${parsed.data.email}`)
      res.status(403).json({ detail: 'Email does not match configured email' })
      return
    }

    if (!secretMatches(ctx.secret, parsed.data.secret)) {
      logger.warn(`Invalid secret for task ${parsed.data.task}`)
      res.status(403).json({ detail: 'Invalid secret' })
      return
    }

    const task = toBuildTask(parsed.data)
    logger.info(`Received task request: ${task.task} (round ${task.round}, ${task.checks.length} checks)`)

    if (!ctx.runner.submit(task)) {
      res.status(503).json({ detail: 'Server is shutting down' })
      return
    }

    res.json({
      status: 'accepted',
      message: `Task ${task.task} received and processing started`,
    })
  })

  // 非法 JSON 等 body-parser 错误
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error)
      return
    }
    logger.error('Request failed', error)
    const isParseError = error instanceof SyntaxError
    res.status(isParseError ? 400 : 500).json({
      detail: isParseError ? 'Malformed JSON body' : 'Internal server error',
    })
  })
}
