/**
 * 一次命令执行的原始结果
 * 只在 runner → contract → store 这条链路上传递，store 保留最近若干条用于调试
 */
export interface RunResult {
  readonly command: string
  readonly cwd: string
  /** 进程未启动、被信号终止时为 null */
  readonly exitCode: number | null
  readonly signal: string | null
  readonly stdout: string
  readonly stderr: string
  /** ISO 8601 */
  readonly startedAt: string
  readonly durationMs: number
  readonly timedOut: boolean
  /** 进程无法启动时的原因（cwd 不存在、权限不足等） */
  readonly spawnError: string | null
}
