/**
 * @entry Config 配置模块
 *
 * 加载 YAML 配置、Schema 校验、环境变量覆盖
 */

export {
  loadConfig,
  getDefaultConfig,
  clearConfigCache,
  applyEnvOverrides,
  CONFIG_FILENAME,
} from './loadConfig.js'
export * from './schema.js'

import { loadConfig } from './loadConfig.js'
import { AppError } from '../shared/error.js'
import { type Result, ok, err } from '../shared/result.js'
import type { ServerConfig } from './schema.js'

/** Server config with a required secret; a missing secret only blocks the server */
export async function getServerConfig(): Promise<Result<ServerConfig & { secret: string }, AppError>> {
  const config = await loadConfig()
  const { secret } = config.server
  if (!secret) return err(AppError.configMissing('server.secret (AVF_SECRET)'))
  return ok({ ...config.server, secret })
}
