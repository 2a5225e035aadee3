/**
 * Command Runner
 *
 * 在 checkfile 所在真实目录下通过 shell 执行 check 命令：
 * - PATH 前置脚本目录（jenkins.check 等内置适配器所在位置），其它环境变量继承
 * - 进程以 detached 方式启动，自成进程组（终端的 Ctrl+C 不会传到这里）；
 *   超时或 signal 中止时整组 SIGKILL
 * - 永不 reject：启动失败也返回 RunResult（spawnError），由 contract 层归类为 error
 */

import { execa, ExecaError } from 'execa'
import { delimiter } from 'path'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { now } from '../shared/formatTime.js'
import type { CheckDefinition } from '../checkfile/types.js'
import type { RunResult } from '../types/runResult.js'

const logger = createLogger('runner')

export const TIMEOUT_MARKER = '[checkpulse] timed out'

export interface RunCommandOptions {
  /** 前置到 PATH 的目录 */
  scriptsDir?: string
  /** 不设置则不限时 */
  timeoutMs?: number
  /** 额外环境变量 */
  env?: Record<string, string>
  /** 中止时杀掉整个进程组 */
  signal?: AbortSignal
}

/** 可替换的执行函数，scheduler / orchestrator 依赖这个签名，测试里注入假实现 */
export interface CommandExecutor {
  (def: CheckDefinition): Promise<RunResult>
  /** 杀掉所有进行中的命令，orchestrator.stop() 调用 */
  abortAll?(): void
}

export function buildPath(scriptsDir: string | undefined, basePath: string | undefined): string | undefined {
  if (!scriptsDir) return basePath
  return basePath ? `${scriptsDir}${delimiter}${basePath}` : scriptsDir
}

function killProcessGroup(pid: number | undefined, fallback: () => void): void {
  if (pid === undefined) {
    fallback()
    return
  }
  try {
    process.kill(-pid, 'SIGKILL')
  } catch (error) {
    // 进程组已退出或不存在时退回只杀子进程本身
    logger.debug(`Process group ${pid} kill failed: ${getErrorMessage(error)}`)
    fallback()
  }
}

export async function runCommand(def: CheckDefinition, options: RunCommandOptions = {}): Promise<RunResult> {
  const { scriptsDir, timeoutMs, env = {}, signal } = options
  const startedAt = now()
  const startTime = Date.now()
  let timedOut = false

  const base = {
    command: def.command,
    cwd: def.workingDirectory,
    startedAt,
  }

  try {
    const subprocess = execa(def.command, [], {
      shell: true,
      cwd: def.workingDirectory,
      env: { ...env, PATH: buildPath(scriptsDir, process.env.PATH) },
      stdin: 'ignore',
      reject: false,
      detached: true,
      stripFinalNewline: false,
    })

    const timer =
      timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true
            logger.warn(`Check "${def.name}" timed out after ${timeoutMs}ms, killing process group`)
            killProcessGroup(subprocess.pid, () => subprocess.kill('SIGKILL'))
          }, timeoutMs)
        : null

    const abort = () => {
      logger.debug(`Aborting check "${def.name}", killing process group`)
      killProcessGroup(subprocess.pid, () => subprocess.kill('SIGKILL'))
    }
    if (signal?.aborted) abort()
    else signal?.addEventListener('abort', abort, { once: true })

    const result = await subprocess
    if (timer) clearTimeout(timer)
    signal?.removeEventListener('abort', abort)

    const durationMs = Date.now() - startTime
    const stderr = timedOut
      ? `${result.stderr}${result.stderr && !result.stderr.endsWith('\n') ? '\n' : ''}${TIMEOUT_MARKER} after ${timeoutMs}ms\n`
      : result.stderr

    const notStarted = result.failed && result.exitCode === undefined && result.signal === undefined && !timedOut
    const spawnError = notStarted
      ? result instanceof ExecaError
        ? result.originalMessage || result.shortMessage
        : 'Command failed to start'
      : null

    if (spawnError) {
      logger.debug(`Check "${def.name}" failed to start: ${spawnError}`)
    }

    return {
      ...base,
      exitCode: result.exitCode ?? null,
      signal: result.signal ?? null,
      stdout: result.stdout,
      stderr,
      durationMs,
      timedOut,
      spawnError,
    }
  } catch (error) {
    // execa 同步校验参数失败等情况
    return {
      ...base,
      exitCode: null,
      signal: null,
      stdout: '',
      stderr: '',
      durationMs: Date.now() - startTime,
      timedOut,
      spawnError: getErrorMessage(error),
    }
  }
}

/** 绑定选项，得到 scheduler 使用的 executor */
export function createCommandExecutor(options: Omit<RunCommandOptions, 'signal'> = {}): CommandExecutor {
  let controller = new AbortController()

  const executor: CommandExecutor = def => runCommand(def, { ...options, signal: controller.signal })
  executor.abortAll = () => {
    controller.abort()
    // 之后的执行（例如重新 start）不受影响
    controller = new AbortController()
  }
  return executor
}
