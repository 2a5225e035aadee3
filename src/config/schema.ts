import { z } from 'zod'

export const configSchema = z.object({
  /** 每个 check 的执行间隔（秒） */
  runInterval: z.number().int().positive().default(10),
  /** checkfile 根目录，支持 ~ 开头 */
  checksDir: z.string().min(1).default('~/Checkpulse'),
  /** 追加到 PATH 前面的脚本目录，默认为包内 scripts/ */
  scriptsDir: z.string().min(1).optional(),
  /** 单次执行超时（秒），不配置则不限时 */
  commandTimeout: z.number().positive().optional(),
  /** 全局并发上限，不配置则每个 check 各自独立运行 */
  maxConcurrentRuns: z.number().int().positive().optional(),
  /** 每个 check 保留的执行历史条数，0 表示不保留 */
  historyLimit: z.number().int().nonnegative().default(20),
  /** checkfile 变化后的防抖时间（毫秒） */
  reloadDebounce: z.number().int().nonnegative().default(500),
  /** 执行日志（JSON Lines）路径，不配置则不写 */
  debugLog: z.string().min(1).optional(),
})

export type Config = z.infer<typeof configSchema>
