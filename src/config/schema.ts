import { z } from 'zod'

export const validationConfigSchema = z.object({
  /** Live page fetch timeout in ms */
  pageTimeoutMs: z.number().int().positive().default(10_000),
  /** Live pages smaller than this get a warning */
  minPageBytes: z.number().int().nonnegative().default(100),
})

export const notifyConfigSchema = z.object({
  /** Callback POST timeout in ms */
  timeoutMs: z.number().int().positive().default(15_000),
  /** Wait before each retry; its length is the retry budget */
  retryDelaysSeconds: z.array(z.number().nonnegative()).default([1, 2, 4, 8, 16]),
})

export const serverConfigSchema = z.object({
  port: z.number().int().positive().default(8000),
  host: z.string().default('0.0.0.0'),
  /** Shared secret expected in build requests */
  secret: z.string().optional(),
  /** When set, build requests for any other email are refused */
  email: z.string().optional(),
})

export const taskConfigSchema = z.object({
  /** Max tasks processed at once */
  concurrency: z.number().int().positive().default(4),
})

export const configSchema = z.object({
  validation: validationConfigSchema.default({}),
  notify: notifyConfigSchema.default({}),
  server: serverConfigSchema.default({}),
  tasks: taskConfigSchema.default({}),
})

export type ValidationConfig = z.infer<typeof validationConfigSchema>
export type NotifyConfig = z.infer<typeof notifyConfigSchema>
export type ServerConfig = z.infer<typeof serverConfigSchema>
export type TaskConfig = z.infer<typeof taskConfigSchema>
export type Config = z.infer<typeof configSchema>
