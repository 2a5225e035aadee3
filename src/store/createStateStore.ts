/**
 * State Store
 *
 * check 名 → 当前 CheckState + 最近 N 次执行记录。
 * 每次写入都生成新的冻结对象整体替换，读者拿到的永远是完整状态，不会看到写了一半的记录。
 * 同一 check 的写入按执行完成顺序生效（由调用方保证顺序，store 不重排）。
 */

import { now } from '../shared/formatTime.js'
import type { CheckDefinition } from '../checkfile/types.js'
import type { RunResult } from '../types/runResult.js'
import type { CheckOutcome, CheckSnapshot, CheckState, InfoPair, RunRecord } from '../types/checkState.js'

export const DEFAULT_HISTORY_LIMIT = 20

export interface StateStoreOptions {
  historyLimit?: number
}

export interface SyncOptions {
  /** 需要回到 pending 的 check（命令或工作目录变更） */
  reset?: Iterable<string>
}

export interface StateStore {
  /**
   * 与 registry 对齐：新名字 → pending，消失的名字删除，已有名字只更新 section；
   * 快照顺序与传入顺序一致
   */
  sync(defs: readonly CheckDefinition[], options?: SyncOptions): void
  /** 写入一次执行结果；名字不存在（已被移除）时返回 null */
  apply(name: string, run: RunResult, outcome: CheckOutcome): CheckSnapshot | null
  get(name: string): CheckSnapshot | undefined
  snapshot(): readonly CheckSnapshot[]
  /** 最近的执行记录，旧 → 新 */
  history(name: string): readonly RunRecord[]
  size(): number
  clear(): void
}

function freezeInfo(info: readonly InfoPair[]): readonly InfoPair[] {
  return Object.freeze(info.map(([label, value]) => Object.freeze([label, value] as const)))
}

function pendingState(def: CheckDefinition): CheckState {
  return Object.freeze({
    name: def.name,
    section: def.section,
    status: 'pending',
    changing: false,
    url: null,
    info: Object.freeze([]),
    lastRun: null,
    updatedAt: null,
  })
}

export function createStateStore(options: StateStoreOptions = {}): StateStore {
  const historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT
  if (!Number.isInteger(historyLimit) || historyLimit < 0) {
    throw new Error(`historyLimit must be a non-negative integer, got ${historyLimit}`)
  }

  let states = new Map<string, CheckState>()
  const histories = new Map<string, readonly RunRecord[]>()
  // 缓存最近一次快照，没有写入时重复读取返回同一个数组
  let cachedSnapshot: readonly CheckSnapshot[] | null = null

  return {
    sync(defs, syncOptions = {}) {
      const reset = new Set(syncOptions.reset ?? [])
      const next = new Map<string, CheckState>()

      for (const def of defs) {
        const existing = states.get(def.name)
        if (!existing || reset.has(def.name)) {
          next.set(def.name, pendingState(def))
          histories.delete(def.name)
        } else if (existing.section !== def.section) {
          next.set(def.name, Object.freeze({ ...existing, section: def.section }))
        } else {
          next.set(def.name, existing)
        }
      }

      for (const name of histories.keys()) {
        if (!next.has(name)) histories.delete(name)
      }

      states = next
      cachedSnapshot = null
    },

    apply(name, run, outcome) {
      const existing = states.get(name)
      if (!existing) return null

      const frozenRun = Object.freeze({ ...run })
      const info = freezeInfo(outcome.info)
      const state: CheckState = Object.freeze({
        name,
        section: existing.section,
        status: outcome.status,
        changing: outcome.changing,
        url: outcome.url,
        info,
        lastRun: frozenRun,
        updatedAt: now(),
      })
      states.set(name, state)
      cachedSnapshot = null

      if (historyLimit > 0) {
        const record: RunRecord = Object.freeze({
          status: outcome.status,
          changing: outcome.changing,
          url: outcome.url,
          info,
          run: frozenRun,
        })
        const previous = histories.get(name) ?? []
        histories.set(name, Object.freeze([...previous, record].slice(-historyLimit)))
      }

      return state
    },

    get(name) {
      return states.get(name)
    },

    snapshot() {
      if (!cachedSnapshot) cachedSnapshot = Object.freeze([...states.values()])
      return cachedSnapshot
    },

    history(name) {
      return histories.get(name) ?? []
    },

    size() {
      return states.size
    },

    clear() {
      states = new Map()
      histories.clear()
      cachedSnapshot = null
    },
  }
}
