/**
 * File Watcher
 *
 * 监听 checkfile 所在的每个目录（非递归，目录列表在每次 reload 后由 update 刷新）。
 * 一串连续事件在 debounce 窗口内合并成一次 onChange。
 *
 * 任一目录监听出错：关闭全部监听，onError 只回调一次，之后不再触发 reload，
 * 已在运行的 check 不受影响。
 */

import { watch, type FSWatcher } from 'fs'
import { basename } from 'path'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { isHiddenName } from '../checkfile/discoverCheckfiles.js'

const logger = createLogger('watcher')

export const DEFAULT_RELOAD_DEBOUNCE_MS = 500

export interface WatchCheckfilesOptions {
  onChange: () => void
  onError: (error: AppError) => void
  debounceMs?: number
}

export interface CheckfileWatcher {
  /** 替换监听的目录集合 */
  update(directories: readonly string[]): void
  watched(): string[]
  /** 已失败或已关闭时为 false */
  isActive(): boolean
  close(): void
}

export function watchCheckfiles(directories: readonly string[], options: WatchCheckfilesOptions): CheckfileWatcher {
  const { onChange, onError, debounceMs = DEFAULT_RELOAD_DEBOUNCE_MS } = options
  const watchers = new Map<string, FSWatcher>()
  let reloadTimer: ReturnType<typeof setTimeout> | null = null
  let active = true

  function closeAll(): void {
    if (reloadTimer) {
      clearTimeout(reloadTimer)
      reloadTimer = null
    }
    for (const watcher of watchers.values()) watcher.close()
    watchers.clear()
  }

  function fail(dir: string, cause: unknown): void {
    if (!active) return
    active = false
    closeAll()
    const error = AppError.watchFailed(dir, cause)
    logger.error(`${error.message}; automatic reload disabled until restart`)
    onError(error)
  }

  function schedule(dir: string, filename: string | null): void {
    // 编辑器临时文件等隐藏文件不触发 reload
    if (filename && isHiddenName(basename(filename))) return
    logger.debug(`Change in ${dir}${filename ? `: ${filename}` : ''}`)

    if (reloadTimer) clearTimeout(reloadTimer)
    reloadTimer = setTimeout(() => {
      reloadTimer = null
      if (active) onChange()
    }, debounceMs)
  }

  function add(dir: string): void {
    if (!active || watchers.has(dir)) return
    let watcher: FSWatcher
    try {
      watcher = watch(dir, (_eventType, filename) => schedule(dir, filename))
    } catch (error) {
      fail(dir, error)
      return
    }
    watcher.on('error', error => fail(dir, error))
    watchers.set(dir, watcher)
  }

  function update(next: readonly string[]): void {
    if (!active) return
    const wanted = new Set(next)
    for (const [dir, watcher] of watchers) {
      if (!wanted.has(dir)) {
        watcher.close()
        watchers.delete(dir)
      }
    }
    for (const dir of wanted) add(dir)
    if (active) logger.debug(`Watching ${watchers.size} director${watchers.size === 1 ? 'y' : 'ies'}`)
  }

  update(directories)

  return {
    update,
    watched: () => [...watchers.keys()],
    isActive: () => active,
    close() {
      if (!active) return
      active = false
      closeAll()
      logger.debug('Checkfile watching stopped')
    },
  }
}
