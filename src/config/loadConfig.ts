import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.artifact-verifier.yaml'

let cachedConfig: Config | null = null

/**
 * 查找配置文件路径（全局 + 项目）
 * 全局配置为基底，项目配置覆盖其上
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * 加载配置
 * 查找顺序：项目目录 → ~/.artifact-verifier.yaml → 默认配置，最后叠加环境变量
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options.cwd)

  if (!globalPath && !projectPath) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
  const merged = mergeConfig(globalRaw, projectRaw)

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    logger.warn('Config file format error, using defaults', result.error.issues)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse YAML file, returning empty object for empty/comment-only files
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  return isRecord(parsed) ? parsed : {}
}

/**
 * Project fields override global fields; nested objects merge, arrays are replaced.
 */
function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const key of Object.keys(override)) {
    const val = override[key]
    if (val === undefined || val === null) continue
    const current = result[key]
    result[key] = isRecord(val) && isRecord(current) ? mergeConfig(current, val) : val
  }
  return result
}

function parsePositiveInt(value: string | undefined): number | null {
  if (!value) return null
  const n = Number.parseInt(value, 10)
  return Number.isFinite(n) && n > 0 ? n : null
}

/**
 * Apply environment variable overrides to config.
 * Called after schema validation; malformed numbers are ignored.
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env
  let next = config

  if (env.AVF_SECRET) {
    next = { ...next, server: { ...next.server, secret: env.AVF_SECRET } }
  }

  if (env.AVF_EMAIL) {
    next = { ...next, server: { ...next.server, email: env.AVF_EMAIL } }
  }

  const port = parsePositiveInt(env.AVF_PORT)
  if (port !== null) {
    next = { ...next, server: { ...next.server, port } }
  }

  const pageTimeoutMs = parsePositiveInt(env.AVF_PAGE_TIMEOUT_MS)
  if (pageTimeoutMs !== null) {
    next = { ...next, validation: { ...next.validation, pageTimeoutMs } }
  }

  const notifyTimeoutMs = parsePositiveInt(env.AVF_NOTIFY_TIMEOUT_MS)
  if (notifyTimeoutMs !== null) {
    next = { ...next, notify: { ...next.notify, timeoutMs: notifyTimeoutMs } }
  }

  return next
}

export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

export function clearConfigCache(): void {
  cachedConfig = null
}
