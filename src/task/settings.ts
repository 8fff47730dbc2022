import type { Config } from '../config/schema.js'
import type { TaskSettings } from './processTask.js'

export function settingsFromConfig(config: Config): TaskSettings {
  return {
    pageTimeoutMs: config.validation.pageTimeoutMs,
    minPageBytes: config.validation.minPageBytes,
    notifyTimeoutMs: config.notify.timeoutMs,
    retryDelaysSeconds: config.notify.retryDelaysSeconds,
  }
}
