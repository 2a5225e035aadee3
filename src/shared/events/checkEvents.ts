/**
 * Check 生命周期事件
 *
 * orchestrator 发出，CLI / UI 订阅；每个 orchestrator 持有自己的 bus。
 * 监听器抛错或返回 rejected promise 只记录日志，不影响发送方和其他监听器。
 */

import { EventEmitter } from 'events'
import type { AppError } from '../error.js'
import type { CheckSnapshot } from '../../types/checkState.js'
import type { ReloadSummary } from '../../types/reloadSummary.js'
import { createLogger } from '../logger.js'
import { getErrorMessage } from '../assertError.js'

const logger = createLogger('check-events')

export interface CheckEventMap {
  /** 某个 check 写入了新结果 */
  'check:updated': [state: CheckSnapshot]
  'checks:reloaded': [summary: ReloadSummary]
  /** 文件监听失效，之后不再自动 reload */
  'watcher:failed': [error: AppError]
}

export type CheckEventName = keyof CheckEventMap
export type CheckEventListener<K extends CheckEventName> = (...args: CheckEventMap[K]) => unknown

export interface CheckEventBus {
  /** 返回取消订阅函数 */
  on<K extends CheckEventName>(event: K, listener: CheckEventListener<K>): () => void
  once<K extends CheckEventName>(event: K, listener: CheckEventListener<K>): () => void
  emit<K extends CheckEventName>(event: K, ...args: CheckEventMap[K]): boolean
  listenerCount(event: CheckEventName): number
  removeAllListeners(): void
}

function isPromiseLike(value: unknown): value is Promise<unknown> {
  return value instanceof Promise
}

export function createCheckEventBus(): CheckEventBus {
  const emitter = new EventEmitter()

  function isolate<K extends CheckEventName>(event: K, listener: CheckEventListener<K>) {
    return (...args: CheckEventMap[K]): void => {
      try {
        const result = listener(...args)
        if (isPromiseLike(result)) {
          result.catch((e: unknown) => {
            logger.error(`Async listener error for ${event}: ${getErrorMessage(e)}`)
          })
        }
      } catch (e) {
        logger.error(`Listener error for ${event}: ${getErrorMessage(e)}`)
      }
    }
  }

  return {
    on(event, listener) {
      const wrapped = isolate(event, listener)
      emitter.on(event, wrapped)
      return () => {
        emitter.off(event, wrapped)
      }
    },

    once(event, listener) {
      const wrapped = isolate(event, listener)
      emitter.once(event, wrapped)
      return () => {
        emitter.off(event, wrapped)
      }
    },

    emit(event, ...args) {
      return emitter.emit(event, ...args)
    },

    listenerCount(event) {
      return emitter.listenerCount(event)
    },

    removeAllListeners() {
      emitter.removeAllListeners()
    },
  }
}
