/**
 * 配置文件 + 命令行参数 → orchestrator 选项
 * 命令行参数优先
 */

import { InvalidArgumentError } from 'commander'
import { loadConfig, expandHome, BUNDLED_SCRIPTS_DIR } from '../config/index.js'
import { createCommandExecutor } from '../runner/index.js'
import { createOrchestrator, type Orchestrator } from '../orchestrator/index.js'

export interface CheckSourceFlags {
  dir?: string
  interval?: number
}

export interface ResolvedSettings {
  checksDir: string
  runIntervalSeconds: number
  scriptsDir: string
  timeoutMs?: number
  maxConcurrentRuns?: number
  historyLimit: number
  reloadDebounceMs: number
  debugLogPath?: string
}

/** commander 参数解析：正整数 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('需要正整数')
  }
  return parsed
}

export async function resolveSettings(flags: CheckSourceFlags): Promise<ResolvedSettings> {
  const config = await loadConfig()
  return {
    checksDir: expandHome(flags.dir ?? config.checksDir),
    runIntervalSeconds: flags.interval ?? config.runInterval,
    scriptsDir: config.scriptsDir ? expandHome(config.scriptsDir) : BUNDLED_SCRIPTS_DIR,
    timeoutMs: config.commandTimeout !== undefined ? config.commandTimeout * 1000 : undefined,
    maxConcurrentRuns: config.maxConcurrentRuns,
    historyLimit: config.historyLimit,
    reloadDebounceMs: config.reloadDebounce,
    debugLogPath: config.debugLog ? expandHome(config.debugLog) : undefined,
  }
}

export function createCheckOrchestrator(settings: ResolvedSettings, options: { watch: boolean }): Orchestrator {
  return createOrchestrator({
    checksDir: settings.checksDir,
    runIntervalSeconds: settings.runIntervalSeconds,
    executor: createCommandExecutor({ scriptsDir: settings.scriptsDir, timeoutMs: settings.timeoutMs }),
    maxConcurrentRuns: settings.maxConcurrentRuns,
    historyLimit: settings.historyLimit,
    watch: options.watch,
    reloadDebounceMs: settings.reloadDebounceMs,
    debugLogPath: settings.debugLogPath,
  })
}
