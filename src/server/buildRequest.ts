import { z } from 'zod'
import type { BuildTask } from '../types/task.js'

export const attachmentSchema = z.object({
  name: z.string(),
  /** data:mime/type;base64,... */
  url: z.string(),
})

export const buildRequestSchema = z.object({
  email: z.string(),
  secret: z.string(),
  task: z.string().min(1),
  round: z.number().int().min(1),
  nonce: z.string(),
  brief: z.string(),
  // A single check may arrive as a bare string
  checks: z.union([z.string(), z.array(z.string())]).transform(v => (typeof v === 'string' ? [v] : v)),
  evaluation_url: z.string().min(1),
  attachments: z.array(attachmentSchema).optional().default([]),
})

export type BuildRequest = z.infer<typeof buildRequestSchema>

export function toBuildTask(request: BuildRequest): BuildTask {
  return {
    email: request.email,
    task: request.task,
    round: request.round,
    nonce: request.nonce,
    brief: request.brief,
    checks: request.checks,
    evaluationUrl: request.evaluation_url,
    attachments: request.attachments,
  }
}
