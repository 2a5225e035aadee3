import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { dirname, join, resolve } from 'path'
import { homedir } from 'os'
import { fileURLToPath } from 'url'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

const CONFIG_FILENAME = '.checkpulse.yaml'

let cachedConfig: Config | null = null

/** 包内 scripts/ 目录（src/config 与 dist/config 到包根都是两级） */
export const BUNDLED_SCRIPTS_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'scripts')

export function expandHome(path: string): string {
  if (path === '~') return homedir()
  if (path.startsWith('~/')) return join(homedir(), path.slice(2))
  return resolve(path)
}

/**
 * 加载配置
 * 查找顺序：options.path → ~/.checkpulse.yaml → 默认配置；环境变量最后覆盖
 */
export async function loadConfig(options: { path?: string } = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const configPath = options.path ?? join(homedir(), CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  let raw: unknown
  try {
    raw = YAML.parse(await readFile(configPath, 'utf-8')) ?? {}
  } catch (error) {
    logger.warn(`Cannot parse ${configPath}, using defaults: ${getErrorMessage(error)}`)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const result = configSchema.safeParse(raw)
  if (!result.success) {
    logger.warn('Config file format error, using defaults', result.error.issues)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

/**
 * 环境变量覆盖
 * CHECKPULSE_RUN_INTERVAL 非正整数时忽略
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env
  let next = config

  if (env.CHECKPULSE_CHECKS_DIR) {
    next = { ...next, checksDir: env.CHECKPULSE_CHECKS_DIR }
  }

  if (env.CHECKPULSE_RUN_INTERVAL) {
    const parsed = configSchema.shape.runInterval.safeParse(Number(env.CHECKPULSE_RUN_INTERVAL))
    if (parsed.success) {
      next = { ...next, runInterval: parsed.data }
    } else {
      logger.warn(`Ignoring CHECKPULSE_RUN_INTERVAL=${env.CHECKPULSE_RUN_INTERVAL}`)
    }
  }

  return next
}

export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

/** 清除配置缓存 */
export function clearConfigCache(): void {
  cachedConfig = null
}
