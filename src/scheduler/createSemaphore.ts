/**
 * 进程内信号量
 * 给 scheduler 提供可选的全局并发上限；等待者按 FIFO 顺序获得许可
 */

export interface Semaphore {
  /** 获得许可后 resolve，返回的函数用于释放（重复调用无副作用） */
  acquire(): Promise<() => void>
  tryAcquire(): (() => void) | null
  inFlight(): number
  waiting(): number
  peak(): number
}

export function createSemaphore(maxPermits: number): Semaphore {
  if (!Number.isInteger(maxPermits) || maxPermits <= 0) {
    throw new Error('Semaphore maxPermits must be a positive integer')
  }

  let permits = maxPermits
  let current = 0
  let peakInFlight = 0
  const waiters: Array<(release: () => void) => void> = []

  function grant(): () => void {
    current++
    if (current > peakInFlight) peakInFlight = current
    let released = false
    return () => {
      if (released) return
      released = true
      current--
      const next = waiters.shift()
      if (next) {
        next(grant())
      } else {
        permits++
      }
    }
  }

  return {
    acquire() {
      if (permits > 0) {
        permits--
        return Promise.resolve(grant())
      }
      return new Promise(resolve => {
        waiters.push(resolve)
      })
    },

    tryAcquire() {
      if (permits === 0) return null
      permits--
      return grant()
    },

    inFlight: () => current,
    waiting: () => waiters.length,
    peak: () => peakInFlight,
  }
}
