/**
 * @entry Store 状态存储
 *
 * 进程内的 check 状态与执行历史，UI 只读快照
 */

export {
  type StateStore,
  type StateStoreOptions,
  type SyncOptions,
  DEFAULT_HISTORY_LIMIT,
  createStateStore,
} from './createStateStore.js'
