import type { RunResult } from './runResult.js'

/**
 * pending 同时表示"从未跑完一次"和"正在跑第一次"，不存在 running 状态
 */
export type CheckStatus = 'pending' | 'ok' | 'failing' | 'error'

export const CHECK_STATUSES: readonly CheckStatus[] = ['pending', 'ok', 'failing', 'error']

/** info 列表中的 (label, value) */
export type InfoPair = readonly [label: string, value: string]

/** 契约解析后的结果，error 表示输出不符合契约或进程失败 */
export interface CheckOutcome {
  readonly status: Exclude<CheckStatus, 'pending'>
  readonly changing: boolean
  readonly url: string | null
  readonly info: readonly InfoPair[]
}

export interface CheckState {
  readonly name: string
  readonly section: string | null
  readonly status: CheckStatus
  readonly changing: boolean
  readonly url: string | null
  readonly info: readonly InfoPair[]
  readonly lastRun: RunResult | null
  /** 最近一次结果写入时间；pending 时为 null */
  readonly updatedAt: string | null
}

/** UI 读取的快照，等同于冻结后的 CheckState */
export type CheckSnapshot = CheckState

/** 历史记录：一次执行 + 其解析结果 */
export interface RunRecord extends CheckOutcome {
  readonly run: RunResult
}

export function isFailureStatus(status: CheckStatus): boolean {
  return status === 'failing' || status === 'error'
}
