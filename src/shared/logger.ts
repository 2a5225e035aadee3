/**
 * 统一日志系统
 *
 * - 分级日志（debug/info/warn/error）
 * - 前台/后台模式：前台只输出时间+级别+消息，后台附带 scope
 * - 日志聚合：scheduler 高频的"跳过本次触发"类日志在 1 秒窗口内合并
 *
 * 诊断日志走这里；面向用户的终端输出走 cli/output.ts
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type LogMode = 'foreground' | 'background'

type ActiveLevel = Exclude<LogLevel, 'silent'>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<ActiveLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<ActiveLevel, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

// ============ 全局状态 ============

function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const fromEnv = process.env.LOG_LEVEL
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv
  return 'info'
}

function initLogMode(): LogMode {
  if (process.env.CHECKPULSE_BACKGROUND === '1') return 'background'
  return process.stdout.isTTY ? 'foreground' : 'background'
}

let currentLevel: LogLevel = initLogLevel()
const currentMode: LogMode = initLogMode()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function formatClock(): string {
  const now = new Date()
  const parts = [now.getHours(), now.getMinutes(), now.getSeconds()]
  return chalk.dim(parts.map(n => n.toString().padStart(2, '0')).join(':'))
}

function formatMessage(level: ActiveLevel, scope: string, message: string, mode: LogMode): string {
  const color = LEVEL_COLORS[level]
  const label = LEVEL_LABELS[level]

  if (mode === 'foreground') {
    return `${formatClock()} ${color(label)} ${message}`
  }

  const scopeStr = scope ? chalk.cyan(`[${scope}]`) : ''
  return `${formatClock()} ${color(label)} ${scopeStr} ${message}`
}

function write(level: ActiveLevel, output: string, args: unknown[]): void {
  const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
  logFn(output, ...args)
}

// ============ 文件日志（无 ANSI 颜色） ============

// eslint-disable-next-line no-control-regex
const ANSI_REGEX = /\x1b\[[0-9;]*m/g

export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, '')
}

/** JSON Lines 日志条目，debug run log 使用 */
export interface JsonLogEntry {
  timestamp: string
  level: ActiveLevel
  scope?: string
  message: string
  data?: Record<string, unknown>
}

export function formatJsonLogEntry(
  level: ActiveLevel,
  scope: string,
  message: string,
  data?: Record<string, unknown>
): string {
  const entry: JsonLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message: stripAnsi(message),
  }
  if (scope) entry.scope = scope
  if (data) entry.data = data
  return JSON.stringify(entry)
}

// ============ 日志聚合 ============

interface AggregatedLog {
  message: string
  level: ActiveLevel
  scope: string
  mode: LogMode
  count: number
  lastTime: number
  args: unknown[]
}

const LOG_AGGREGATION_WINDOW_MS = 1000
const aggregatedLogs = new Map<string, AggregatedLog>()
let aggregationTimer: ReturnType<typeof setTimeout> | null = null

function outputAggregatedLog(log: AggregatedLog): void {
  const text = log.count > 1 ? `${log.message} (×${log.count})` : log.message
  write(log.level, formatMessage(log.level, log.scope, text, log.mode), log.args)
}

function flushAggregatedLogs(): void {
  const now = Date.now()
  for (const [key, log] of aggregatedLogs) {
    if (now - log.lastTime >= LOG_AGGREGATION_WINDOW_MS) {
      outputAggregatedLog(log)
      aggregatedLogs.delete(key)
    }
  }

  if (aggregatedLogs.size > 0) {
    aggregationTimer = setTimeout(flushAggregatedLogs, LOG_AGGREGATION_WINDOW_MS)
    aggregationTimer.unref()
  } else {
    aggregationTimer = null
  }
}

/** 立即输出所有聚合中的日志，进程退出前调用 */
export function flushLogs(): void {
  if (aggregationTimer) {
    clearTimeout(aggregationTimer)
    aggregationTimer = null
  }
  aggregatedLogs.forEach(log => outputAggregatedLog(log))
  aggregatedLogs.clear()
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export interface LoggerOptions {
  /** 合并 1 秒内重复的日志（仅后台模式） */
  aggregate?: boolean
}

export function createLogger(scope: string = '', options: LoggerOptions = {}): Logger {
  const { aggregate = false } = options

  function logWithLevel(level: ActiveLevel, message: string, args: unknown[]): void {
    if (!shouldLog(level)) return
    const mode = currentMode

    if (aggregate && mode === 'background') {
      const key = `${level}:${scope}:${message}`
      const existing = aggregatedLogs.get(key)
      if (existing) {
        existing.count++
        existing.lastTime = Date.now()
        existing.args = args
      } else {
        aggregatedLogs.set(key, { message, level, scope, mode, count: 1, lastTime: Date.now(), args })
      }
      if (!aggregationTimer) {
        aggregationTimer = setTimeout(flushAggregatedLogs, LOG_AGGREGATION_WINDOW_MS)
        aggregationTimer.unref()
      }
      return
    }

    write(level, formatMessage(level, scope, message, mode), args)
  }

  return {
    debug(message: string, ...args: unknown[]) {
      logWithLevel('debug', message, args)
    },
    info(message: string, ...args: unknown[]) {
      logWithLevel('info', message, args)
    },
    warn(message: string, ...args: unknown[]) {
      logWithLevel('warn', message, args)
    },
    error(message: string, ...args: unknown[]) {
      logWithLevel('error', message, args)
    },
  }
}

// ============ 错误日志增强 ============

/** 错误上下文，附加在错误日志后面便于定位是哪个 check / checkfile */
export interface ErrorContext {
  checkName?: string
  checkfile?: string
  command?: string
  [key: string]: unknown
}

/**
 * 记录带上下文的错误日志
 *
 * @example
 * logError(logger, 'Reload failed', err, { checkfile: '/home/me/Checkpulse/ci' })
 */
export function logError(
  loggerInstance: Logger,
  message: string,
  error: Error | string,
  context?: ErrorContext
): void {
  const errorMessage = error instanceof Error ? error.message : error
  const data: Record<string, unknown> = {}

  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value !== undefined) data[key] = value
    }
  }

  if (error instanceof Error && error.stack) {
    data.stack = error.stack.split('\n').slice(0, 6).join('\n')
  }

  if (Object.keys(data).length > 0) {
    loggerInstance.error(`${message}: ${errorMessage}`, data)
  } else {
    loggerInstance.error(`${message}: ${errorMessage}`)
  }
}
