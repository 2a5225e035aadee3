/**
 * Orchestrator
 *
 * 把各模块串起来的唯一实例：
 *   watcher → loadCheckfiles → registry.reconcile → scheduler / store → events
 *
 * reload 串行执行；启动后 checks 目录消失或监听出错时保留当前 check 继续运行，
 * 只是不再自动 reload（发出 watcher:failed）。
 */

import { appendFile } from 'fs/promises'
import { dirname } from 'path'
import { createLogger, formatJsonLogEntry, logError } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { ensureError, getErrorMessage } from '../shared/assertError.js'
import { createCheckEventBus, type CheckEventBus } from '../shared/events/checkEvents.js'
import { loadCheckfiles, type CheckDefinition, type LoadedCheckfiles } from '../checkfile/index.js'
import { createCheckRegistry } from '../registry/index.js'
import { createScheduler, createSemaphore, type SchedulerStatus } from '../scheduler/index.js'
import { createStateStore } from '../store/index.js'
import { evaluateRun, type CommandExecutor } from '../runner/index.js'
import { watchCheckfiles, type CheckfileWatcher } from '../watcher/index.js'
import type { CheckOutcome, CheckSnapshot, ReloadSummary, RunRecord, RunResult } from '../types/index.js'

const logger = createLogger('orchestrator')

export interface OrchestratorOptions {
  checksDir: string
  runIntervalSeconds: number
  executor: CommandExecutor
  maxConcurrentRuns?: number
  historyLimit?: number
  /** 默认 true；一次性运行（runOnce）不需要监听 */
  watch?: boolean
  reloadDebounceMs?: number
  /** 每次执行追加一行 JSON 到该文件 */
  debugLogPath?: string
}

export interface OrchestratorStatus {
  checksDir: string
  started: boolean
  watching: boolean
  scheduler: SchedulerStatus
}

export interface Orchestrator {
  readonly events: CheckEventBus
  /** 首次加载 + 调度 + 开始监听；checks 目录不存在时 reject */
  start(): Promise<ReloadSummary>
  /** 重新加载 checkfile 并同步调度 */
  reload(): Promise<ReloadSummary>
  /** 不启动定时器，按名字执行一次（不传则全部），返回对应快照 */
  runOnce(names?: readonly string[]): Promise<readonly CheckSnapshot[]>
  runNow(name: string): boolean
  setRunInterval(seconds: number): void
  snapshot(): readonly CheckSnapshot[]
  history(name: string): readonly RunRecord[]
  definitions(): CheckDefinition[]
  status(): OrchestratorStatus
  waitForIdle(): Promise<void>
  /** 停止调度和监听，等待进行中的执行与日志写入结束 */
  stop(): Promise<void>
}

/** 要监听的目录：遍历过的目录 + 软链接 checkfile 的真实所在目录 */
function watchTargets(loaded: LoadedCheckfiles): string[] {
  const dirs = new Set(loaded.directories)
  for (const file of loaded.files) dirs.add(dirname(file.realPath))
  return [...dirs]
}

function levelFor(outcome: CheckOutcome): 'info' | 'warn' | 'error' {
  if (outcome.status === 'ok') return 'info'
  return outcome.status === 'failing' ? 'warn' : 'error'
}

export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  const { checksDir, executor, debugLogPath } = options
  const events = createCheckEventBus()
  const registry = createCheckRegistry()
  const store = createStateStore({ historyLimit: options.historyLimit })
  const scheduler = createScheduler({
    runIntervalSeconds: options.runIntervalSeconds,
    execute: executor,
    onResult: recordResult,
    maxConcurrentRuns: options.maxConcurrentRuns,
  })

  let started = false
  let loaded = false
  let watcher: CheckfileWatcher | null = null
  let watchFailed = false
  let reloadChain: Promise<void> = Promise.resolve()
  let debugWrites: Promise<void> = Promise.resolve()

  function writeDebugLog(def: CheckDefinition, run: RunResult, outcome: CheckOutcome): void {
    if (!debugLogPath) return
    const line = formatJsonLogEntry(levelFor(outcome), 'run', `${def.name} ${outcome.status}`, {
      name: def.name,
      status: outcome.status,
      command: run.command,
      cwd: run.cwd,
      exitCode: run.exitCode,
      signal: run.signal,
      durationMs: run.durationMs,
      timedOut: run.timedOut,
      spawnError: run.spawnError,
      stdout: run.stdout,
      stderr: run.stderr,
      info: outcome.info,
    })
    debugWrites = debugWrites
      .then(() => appendFile(debugLogPath, `${line}\n`, 'utf-8'))
      .catch(error => logger.warn(`Cannot write debug log ${debugLogPath}: ${getErrorMessage(error)}`))
  }

  function recordResult(def: CheckDefinition, run: RunResult): void {
    const outcome = evaluateRun(run)
    const state = store.apply(def.name, run, outcome)
    if (!state) {
      logger.debug(`Dropped result of "${def.name}": no longer registered`)
      return
    }
    logger.debug(`"${def.name}" → ${outcome.status} (${run.durationMs}ms)`)
    writeDebugLog(def, run, outcome)
    events.emit('check:updated', state)
  }

  function degrade(error: AppError): void {
    if (watchFailed) return
    watchFailed = true
    if (watcher) {
      watcher.close()
      watcher = null
    }
    logger.warn('Checkfile changes will not be picked up until restart')
    events.emit('watcher:failed', error)
  }

  async function applyReload(schedule: boolean): Promise<{ summary: ReloadSummary; loadedFiles: LoadedCheckfiles }> {
    const loadedFiles = await loadCheckfiles(checksDir)
    const diff = registry.reconcile(loadedFiles.files)
    loaded = true

    store.sync(registry.list(), { reset: diff.changed.map(d => d.name) })

    // stop() 可能发生在 loadCheckfiles 期间
    if (schedule && started) {
      for (const def of diff.removed) scheduler.cancel(def.name)
      for (const def of diff.changed) scheduler.schedule(def)
      // registry 可能早已由 runOnce / reload / 上一次 start 填好，没有定时器的都要补上
      for (const def of registry.list()) {
        if (!scheduler.isScheduled(def.name)) scheduler.schedule(def)
      }
    }

    const summary: ReloadSummary = {
      checksDir,
      added: diff.added.map(d => d.name),
      removed: diff.removed.map(d => d.name),
      changed: diff.changed.map(d => d.name),
      total: registry.size(),
      collisions: diff.collisions.length,
      diagnostics: loadedFiles.files.reduce((sum, f) => sum + f.diagnostics.length, 0),
      failures: loadedFiles.failures.map(f => f.message),
    }

    logger.info(
      `Loaded ${summary.total} check(s) from ${checksDir}` +
        ` (+${summary.added.length} -${summary.removed.length} ~${summary.changed.length})`
    )
    events.emit('checks:reloaded', summary)
    return { summary, loadedFiles }
  }

  /** reconcile 排队执行，start 与 reload 不会交错 */
  function serialize<T>(task: () => Promise<T>): Promise<T> {
    const next = reloadChain.then(task)
    reloadChain = next.then(
      () => undefined,
      (error: unknown) => logger.debug(`Reload failed: ${getErrorMessage(error)}`)
    )
    return next
  }

  function enqueueReload(): Promise<ReloadSummary> {
    return serialize(async () => {
      const { summary, loadedFiles } = await applyReload(started)
      watcher?.update(watchTargets(loadedFiles))
      return summary
    })
  }

  async function reloadFromWatcher(): Promise<void> {
    try {
      await enqueueReload()
    } catch (error) {
      if (error instanceof AppError && error.code === 'CHECKS_DIR_NOT_FOUND') {
        degrade(AppError.watchFailed(checksDir, error))
        return
      }
      logError(logger, 'Reload failed', ensureError(error), { checkfile: checksDir })
    }
  }

  return {
    events,

    async start() {
      if (started) throw new Error('Orchestrator already started')
      started = true
      watchFailed = false

      let result: Awaited<ReturnType<typeof applyReload>>
      try {
        result = await serialize(() => applyReload(true))
      } catch (error) {
        started = false
        throw error
      }

      if (options.watch ?? true) {
        watcher = watchCheckfiles(watchTargets(result.loadedFiles), {
          debounceMs: options.reloadDebounceMs,
          onChange: () => {
            void reloadFromWatcher()
          },
          onError: degrade,
        })
      }
      return result.summary
    },

    reload: enqueueReload,

    async runOnce(names = []) {
      if (started) throw new Error('runOnce is not available while checks are scheduled')
      if (!loaded) await applyReload(false)

      const defs: CheckDefinition[] = names.length === 0 ? registry.list() : []
      for (const name of new Set(names)) {
        const def = registry.get(name)
        if (!def) throw AppError.checkNotFound(name)
        defs.push(def)
      }

      const limiter = options.maxConcurrentRuns !== undefined ? createSemaphore(options.maxConcurrentRuns) : null
      await Promise.all(
        defs.map(async def => {
          const release = limiter ? await limiter.acquire() : null
          try {
            recordResult(def, await executor(def))
          } finally {
            release?.()
          }
        })
      )
      await debugWrites

      const wanted = new Set(defs.map(d => d.name))
      return store.snapshot().filter(state => wanted.has(state.name))
    },

    runNow(name) {
      return scheduler.runNow(name)
    },

    setRunInterval(seconds) {
      scheduler.setRunInterval(seconds)
    },

    snapshot: () => store.snapshot(),
    history: name => store.history(name),
    definitions: () => registry.list(),

    status() {
      return {
        checksDir,
        started,
        watching: watcher?.isActive() ?? false,
        scheduler: scheduler.status(),
      }
    },

    waitForIdle: () => scheduler.waitForIdle(),

    async stop() {
      started = false
      watcher?.close()
      watcher = null
      scheduler.stop()
      // 子进程自成进程组，收不到终端信号，不杀掉的话卡住的命令会让 stop 一直等下去
      executor.abortAll?.()
      await reloadChain
      await scheduler.waitForIdle()
      await debugWrites
      logger.debug('Orchestrator stopped')
    },
  }
}
