/** 一次 reload（启动或文件变更触发）的结果摘要 */
export interface ReloadSummary {
  readonly checksDir: string
  readonly added: readonly string[]
  readonly removed: readonly string[]
  readonly changed: readonly string[]
  readonly total: number
  /** 同名 check 被后面的 checkfile 覆盖的次数 */
  readonly collisions: number
  readonly diagnostics: number
  /** 读取失败的 checkfile */
  readonly failures: readonly string[]
}
