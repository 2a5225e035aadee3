/**
 * @entry Watcher 模块
 *
 * checkfile 目录变更 → 防抖后触发 reload
 */

export {
  type CheckfileWatcher,
  type WatchCheckfilesOptions,
  DEFAULT_RELOAD_DEBOUNCE_MS,
  watchCheckfiles,
} from './watchCheckfiles.js'
