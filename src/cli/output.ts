/**
 * CLI 用户输出工具
 * 面向用户的终端输出，简洁友好，无时间戳
 *
 * 注意：这些函数仅用于终端用户交互，不用于诊断日志
 * 诊断日志请使用 shared/logger.ts
 */

import chalk from 'chalk'
import { table } from 'table'
import { truncateText } from '../shared/truncateText.js'
import { formatDuration, formatRelative } from '../shared/formatTime.js'
import type { CheckSnapshot, CheckStatus, InfoPair, RunRecord } from '../types/checkState.js'

// ============ 基础输出 ============

/** 成功消息 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

/** 错误消息 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}

/** 警告消息 */
export function warn(message: string): void {
  console.warn(chalk.yellow('!'), message)
}

/** 信息消息 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

/** 输出标题行 */
export function header(title: string): void {
  console.log()
  console.log(chalk.bold(title))
  console.log(chalk.dim('─'.repeat(Math.min(title.length + 4, 40))))
}

/** 输出简单列表（带符号前缀） */
export function bulletList(items: string[], bullet = '•', indent = 2): void {
  const prefix = ' '.repeat(indent)
  for (const item of items) {
    console.log(`${prefix}${chalk.dim(bullet)} ${item}`)
  }
}

// ============ check 状态 ============

const statusColors: Record<CheckStatus, (s: string) => string> = {
  pending: chalk.gray,
  ok: chalk.green,
  failing: chalk.red,
  error: chalk.yellow,
}

const statusIcons: Record<CheckStatus, string> = {
  pending: '…',
  ok: '✓',
  failing: '✗',
  error: '!',
}

export function formatStatus(status: CheckStatus, changing = false): string {
  const label = `${statusIcons[status]} ${status}`
  return statusColors[status](label) + (changing ? chalk.cyan(' ↻') : '')
}

/** 表格里只放第一条有意义的 info，分隔行跳过 */
export function summarizeInfo(info: readonly InfoPair[], maxLength = 48): string {
  const first = info.find(([label, value]) => label.trim() !== '-' && (label.trim() !== '' || value !== ''))
  if (!first) return '-'
  const [label, value] = first
  return truncateText(value ? `${label.trim()}: ${value}` : label.trim(), maxLength)
}

export const STATUS_HEADERS = ['状态', 'Check', '分组', '摘要', '更新']

export function buildStatusRows(states: readonly CheckSnapshot[]): string[][] {
  const rows: string[][] = [STATUS_HEADERS.map(h => chalk.bold(h))]
  for (const state of states) {
    rows.push([
      formatStatus(state.status, state.changing),
      state.name,
      state.section ?? '-',
      summarizeInfo(state.info),
      state.updatedAt ? formatRelative(state.updatedAt) : '-',
    ])
  }
  return rows
}

export function renderStatusTable(states: readonly CheckSnapshot[]): string {
  if (states.length === 0) return chalk.dim('  (没有 check)\n')
  return table(buildStatusRows(states))
}

/** 各状态数量，如 "3 ok · 1 failing" */
export function summarizeCounts(states: readonly CheckSnapshot[]): string {
  const counts = new Map<CheckStatus, number>()
  for (const state of states) counts.set(state.status, (counts.get(state.status) ?? 0) + 1)
  const order: CheckStatus[] = ['ok', 'failing', 'error', 'pending']
  const parts = order.filter(s => counts.has(s)).map(s => statusColors[s](`${counts.get(s) ?? 0} ${s}`))
  return parts.length > 0 ? parts.join(chalk.dim(' · ')) : chalk.dim('0 checks')
}

// ============ debug 视图 ============

function indentBlock(text: string, prefix = '    '): string {
  const trimmed = text.replace(/\n+$/, '')
  if (!trimmed) return `${prefix}${chalk.dim('(empty)')}`
  return trimmed
    .split('\n')
    .map(line => `${prefix}${line}`)
    .join('\n')
}

/** 一次执行的完整信息：命令、目录、退出码、stdout、stderr、info */
export function formatDebugView(state: CheckSnapshot): string {
  const lines: string[] = [`${chalk.bold(state.name)}  ${formatStatus(state.status, state.changing)}`]
  if (state.url) lines.push(`  ${chalk.gray('URL:')} ${chalk.underline(state.url)}`)

  const run = state.lastRun
  if (!run) {
    lines.push(chalk.dim('  (尚未执行)'))
    return lines.join('\n')
  }

  const exit = run.exitCode !== null ? String(run.exitCode) : run.signal ? `signal ${run.signal}` : '-'
  lines.push(`  ${chalk.gray('Command:')} ${run.command}`)
  lines.push(`  ${chalk.gray('Cwd:')}     ${run.cwd}`)
  lines.push(`  ${chalk.gray('Exit:')}    ${exit}${run.timedOut ? chalk.yellow(' (timed out)') : ''}`)
  lines.push(`  ${chalk.gray('Time:')}    ${run.startedAt} (${formatDuration(run.durationMs)})`)
  if (run.spawnError) lines.push(`  ${chalk.gray('Spawn:')}   ${chalk.red(run.spawnError)}`)

  if (state.info.length > 0) {
    lines.push(`  ${chalk.gray('Info:')}`)
    for (const [label, value] of state.info) lines.push(`    ${label}${value ? `: ${value}` : ''}`)
  }

  lines.push(`  ${chalk.gray('Stdout:')}`, indentBlock(run.stdout))
  lines.push(`  ${chalk.gray('Stderr:')}`, indentBlock(run.stderr))
  return lines.join('\n')
}

/** 历史记录一行一次：时间 状态 耗时 */
export function formatHistory(records: readonly RunRecord[]): string[] {
  return records.map(
    record =>
      `${record.run.startedAt}  ${formatStatus(record.status, record.changing)}  ${formatDuration(record.run.durationMs)}`
  )
}
