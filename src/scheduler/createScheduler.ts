/**
 * Scheduler
 *
 * 每个 check 一个独立的周期定时器：schedule 时立即执行一次，之后每 runInterval 秒触发。
 *
 * 不重叠：同一个 check 上一次执行未结束时，新的触发直接丢弃（不排队）。
 * 取消：停止后续触发；正在执行的那次允许跑完，但结果丢弃。
 * 重新调度（命令变更）或取消后再次加入时，若旧执行仍在进行，新定义的首次执行推迟到旧执行结束后。
 *
 * 间隔变更策略：setRunInterval 只影响之后创建的定时器（新增或重新调度的 check），
 * 已有定时器保持原周期直到该 check 被重新调度。
 */

import { createLogger, logError } from '../shared/logger.js'
import { ensureError, getErrorMessage } from '../shared/assertError.js'
import type { CheckDefinition } from '../checkfile/types.js'
import type { RunResult } from '../types/runResult.js'
import { createSemaphore, type Semaphore } from './createSemaphore.js'

const logger = createLogger('scheduler')
const dropLogger = createLogger('scheduler', { aggregate: true })

export type FireTrigger = 'initial' | 'timer' | 'manual'

export interface SchedulerOptions {
  runIntervalSeconds: number
  execute: (def: CheckDefinition) => Promise<RunResult>
  /** 结果回写；已取消或被替换的 check 不会回调 */
  onResult: (def: CheckDefinition, run: RunResult) => void
  /** 全局并发上限，不设置则不限制 */
  maxConcurrentRuns?: number
}

export interface SchedulerStatus {
  runIntervalSeconds: number
  scheduled: string[]
  running: string[]
}

export interface Scheduler {
  schedule(def: CheckDefinition): void
  cancel(name: string): boolean
  /** 跳过定时器立即执行；上一次未结束时返回 false */
  runNow(name: string): boolean
  setRunInterval(seconds: number): void
  isScheduled(name: string): boolean
  isRunning(name: string): boolean
  status(): SchedulerStatus
  /** 等待所有进行中的执行结束（包括结果会被丢弃的） */
  waitForIdle(): Promise<void>
  stop(): void
}

interface ScheduledCheck {
  def: CheckDefinition
  intervalMs: number
  timer: ReturnType<typeof setInterval> | null
  running: Promise<void> | null
}

function toIntervalMs(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`Run interval must be a positive number of seconds, got ${seconds}`)
  }
  return seconds * 1000
}

export function createScheduler(options: SchedulerOptions): Scheduler {
  const { execute, onResult } = options
  let intervalMs = toIntervalMs(options.runIntervalSeconds)
  const limiter: Semaphore | null =
    options.maxConcurrentRuns !== undefined ? createSemaphore(options.maxConcurrentRuns) : null

  const entries = new Map<string, ScheduledCheck>()
  const inFlight = new Set<Promise<void>>()
  // 已取消但仍在执行的 run，同名 check 再次 schedule 时要等它结束
  const settling = new Map<string, Promise<void>>()

  const isCurrent = (entry: ScheduledCheck) => entries.get(entry.def.name) === entry

  async function runEntry(entry: ScheduledCheck): Promise<void> {
    const { name } = entry.def
    let release: (() => void) | null = null
    try {
      if (limiter) release = await limiter.acquire()
      if (!isCurrent(entry)) return

      const result = await execute(entry.def)
      if (!isCurrent(entry)) {
        logger.debug(`Discarding result of "${name}": check was cancelled or replaced`)
        return
      }
      onResult(entry.def, result)
    } catch (error) {
      logError(logger, `Run of "${name}" failed`, ensureError(error), { checkName: name })
    } finally {
      release?.()
    }
  }

  function fire(entry: ScheduledCheck, trigger: FireTrigger): boolean {
    if (!isCurrent(entry)) return false
    if (entry.running) {
      dropLogger.debug(`Skipped ${trigger} run of "${entry.def.name}": previous run still in flight`)
      return false
    }

    const run: Promise<void> = runEntry(entry).finally(() => {
      inFlight.delete(run)
      if (entry.running === run) entry.running = null
    })
    entry.running = run
    inFlight.add(run)
    return true
  }

  function stopTimer(entry: ScheduledCheck): void {
    if (entry.timer) {
      clearInterval(entry.timer)
      entry.timer = null
    }
  }

  function retire(entry: ScheduledCheck): void {
    stopTimer(entry)
    const { name } = entry.def
    const running = entry.running
    if (!running) return
    settling.set(name, running)
    void running.finally(() => {
      if (settling.get(name) === running) settling.delete(name)
    })
  }

  return {
    schedule(def) {
      const previous = entries.get(def.name)
      if (previous) stopTimer(previous)

      // 旧执行仍在进行时，新 entry 继承其 running，保证同名 check 不并发
      const entry: ScheduledCheck = {
        def,
        intervalMs,
        timer: null,
        running: previous?.running ?? settling.get(def.name) ?? null,
      }
      entries.set(def.name, entry)

      const inherited = entry.running
      if (inherited) {
        inherited
          .then(() => {
            if (entry.running === inherited) entry.running = null
            fire(entry, 'initial')
          })
          .catch(error => logger.error(`Deferred start of "${def.name}" failed: ${getErrorMessage(error)}`))
      } else {
        fire(entry, 'initial')
      }

      entry.timer = setInterval(() => fire(entry, 'timer'), entry.intervalMs)
      logger.debug(`Scheduled "${def.name}" every ${entry.intervalMs / 1000}s`)
    },

    cancel(name) {
      const entry = entries.get(name)
      if (!entry) return false
      retire(entry)
      entries.delete(name)
      logger.debug(`Cancelled "${name}"${entry.running ? ' (in-flight run will be discarded)' : ''}`)
      return true
    },

    runNow(name) {
      const entry = entries.get(name)
      if (!entry) return false
      return fire(entry, 'manual')
    },

    setRunInterval(seconds) {
      intervalMs = toIntervalMs(seconds)
      logger.info(`Run interval set to ${seconds}s (applies to newly scheduled checks)`)
    },

    isScheduled(name) {
      return entries.has(name)
    },

    isRunning(name) {
      return entries.get(name)?.running != null
    },

    status() {
      const all = [...entries.values()]
      return {
        runIntervalSeconds: intervalMs / 1000,
        scheduled: all.map(e => e.def.name),
        running: all.filter(e => e.running !== null).map(e => e.def.name),
      }
    },

    async waitForIdle() {
      while (inFlight.size > 0) {
        await Promise.all([...inFlight])
      }
    },

    stop() {
      for (const entry of entries.values()) retire(entry)
      entries.clear()
    },
  }
}
