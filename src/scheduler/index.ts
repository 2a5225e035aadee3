/**
 * @entry Scheduler 调度模块
 *
 * 每个 check 一个周期定时器，同一 check 不重叠执行
 *
 * 能力分组：
 * - 调度: createScheduler（schedule/cancel/runNow/setRunInterval/waitForIdle）
 * - 并发: createSemaphore（可选的全局并发上限）
 */

export {
  type FireTrigger,
  type Scheduler,
  type SchedulerOptions,
  type SchedulerStatus,
  createScheduler,
} from './createScheduler.js'

export { type Semaphore, createSemaphore } from './createSemaphore.js'
