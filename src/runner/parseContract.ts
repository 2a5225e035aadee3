/**
 * Contract Parser
 *
 * check 命令的 stdout 必须是一个 JSON 对象：
 *   {"result": bool, "changing"?: bool, "url"?: string|null, "info"?: [[string, string], ...]}
 * 多余字段忽略。任何不符合契约的情况都归类为 error，并把诊断信息放进 info，
 * UI 不需要对 error 单独处理。
 */

import { z } from 'zod'
import { type Result, ok, err, fromThrowable } from '../shared/result.js'
import { truncateText } from '../shared/truncateText.js'
import type { CheckOutcome, InfoPair } from '../types/checkState.js'
import type { RunResult } from '../types/runResult.js'

const STDERR_PREVIEW_LENGTH = 200

export const infoPairSchema = z.tuple([z.string(), z.string()])

export const contractSchema = z.object({
  result: z.boolean(),
  changing: z.boolean().default(false),
  url: z.string().nullable().default(null),
  info: z.array(infoPairSchema).default([]),
})

export type CheckContract = z.infer<typeof contractSchema>

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/** 解析 stdout，失败时返回可直接展示的诊断文本 */
export function parseContract(stdout: string): Result<CheckContract, string> {
  if (!stdout.trim()) return err('No output')

  const json = fromThrowable((): unknown => JSON.parse(stdout))
  if (!json.ok) return err(`Invalid JSON: ${json.error.message}`)

  const parsed = contractSchema.safeParse(json.value)
  if (!parsed.success) return err(`Invalid contract: ${formatIssues(parsed.error)}`)

  return ok(parsed.data)
}

function firstLine(text: string): string | null {
  const line = text.split('\n').find(l => l.trim().length > 0)
  return line ? truncateText(line, STDERR_PREVIEW_LENGTH) : null
}

/** 进程失败的 info：Error 在前，随后附带退出码和 stderr 首行 */
export function buildErrorInfo(message: string, run: RunResult): InfoPair[] {
  const info: InfoPair[] = [['Error', message]]
  if (run.exitCode !== null && run.exitCode !== 0) info.push(['Exit', String(run.exitCode)])
  if (run.signal) info.push(['Signal', run.signal])
  const stderrLine = firstLine(run.stderr)
  if (stderrLine) info.push(['Stderr', stderrLine])
  return info
}

export function errorOutcome(message: string, run: RunResult): CheckOutcome {
  return { status: 'error', changing: false, url: null, info: buildErrorInfo(message, run) }
}

/**
 * RunResult → CheckOutcome
 *
 * 退出码非 0 但 stdout 是合法契约时照常采用
 */
export function evaluateRun(run: RunResult): CheckOutcome {
  if (run.spawnError) return errorOutcome(`Spawn failed: ${run.spawnError}`, run)
  if (run.timedOut) return errorOutcome(`Timed out after ${run.durationMs}ms`, run)

  const parsed = parseContract(run.stdout)
  if (!parsed.ok) {
    const message = parsed.error === 'No output' ? `No output (exit ${run.exitCode ?? run.signal ?? '?'})` : parsed.error
    return errorOutcome(message, run)
  }

  const contract = parsed.value
  return {
    status: contract.result ? 'ok' : 'failing',
    changing: contract.changing,
    url: contract.url,
    info: contract.info,
  }
}
