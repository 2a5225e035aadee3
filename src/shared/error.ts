/**
 * 统一错误处理
 * 错误分类 + 错误码 + 修复建议，CLI 通过 format() 输出
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

// ============ 错误分类定义 ============

export type ErrorCategory =
  | 'CONFIG' // 配置错误
  | 'CHECKFILE' // checkfile 读取/解析
  | 'NETWORK' // 上游拉取
  | 'RESOURCE' // 文件/目录/job 不存在
  | 'WATCH' // 文件监听
  | 'UNKNOWN'

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'CHECKS_DIR_NOT_FOUND'
  | 'CHECKFILE_READ_FAILED'
  | 'CHECK_NOT_FOUND'
  | 'UPSTREAM_FETCH_FAILED'
  | 'UPSTREAM_PARSE_FAILED'
  | 'JOB_NOT_FOUND'
  | 'WATCH_FAILED'
  | 'UNKNOWN'

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /** 格式化错误输出到终端 */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('错误') + ` [${colorFn(categoryLabels[this.category])}]`)
    lines.push('')
    lines.push(chalk.dim(`  代码: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  建议修复:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ 工厂方法 ============

  static configInvalid(reason: string): AppError {
    return new AppError('CONFIG_INVALID', `Invalid config: ${reason}`, 'CONFIG', undefined, '检查 ~/.checkpulse.yaml 的字段和类型')
  }

  static checksDirNotFound(dir: string, cause?: unknown): AppError {
    return new AppError(
      'CHECKS_DIR_NOT_FOUND',
      `Checks directory not found: ${dir}`,
      'RESOURCE',
      cause,
      `创建目录: mkdir -p ${dir}，或通过 --dir 指定`
    )
  }

  static checkfileRead(path: string, cause: unknown): AppError {
    return new AppError(
      'CHECKFILE_READ_FAILED',
      `Cannot read checkfile ${path}: ${getErrorMessage(cause)}`,
      'CHECKFILE',
      cause,
      `检查文件权限: ls -la ${path}`
    )
  }

  static checkNotFound(name: string): AppError {
    return new AppError('CHECK_NOT_FOUND', `Check not found: ${name}`, 'RESOURCE', undefined, '查看所有 check: checkpulse list')
  }

  static upstreamFetch(url: string, cause: unknown): AppError {
    return new AppError(
      'UPSTREAM_FETCH_FAILED',
      `Failed to fetch ${url}: ${getErrorMessage(cause)}`,
      'NETWORK',
      cause,
      '检查网络连接以及 Jenkins 地址是否正确'
    )
  }

  static upstreamParse(url: string, cause: unknown): AppError {
    return new AppError(
      'UPSTREAM_PARSE_FAILED',
      `Unexpected response from ${url}: ${getErrorMessage(cause)}`,
      'NETWORK',
      cause,
      '用 --pretty-api 重新运行并检查返回内容'
    )
  }

  static jobNotFound(job: string): AppError {
    return new AppError('JOB_NOT_FOUND', `status for ${job} is not available`, 'RESOURCE', undefined, '确认 job 名称，或去掉 --root-api')
  }

  static watchFailed(dir: string, cause: unknown): AppError {
    return new AppError(
      'WATCH_FAILED',
      `Stopped watching ${dir}: ${getErrorMessage(cause)}`,
      'WATCH',
      cause,
      '修复目录后重启 checkpulse'
    )
  }

  static unknown(cause: unknown): AppError {
    return new AppError('UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }
}

// ============ 格式化输出 ============

const categoryLabels: Record<ErrorCategory, string> = {
  CONFIG: '配置',
  CHECKFILE: 'Checkfile',
  NETWORK: '网络',
  RESOURCE: '资源',
  WATCH: '文件监听',
  UNKNOWN: '未知',
}

const categoryColors: Record<ErrorCategory, (s: string) => string> = {
  CONFIG: chalk.magenta,
  CHECKFILE: chalk.magenta,
  NETWORK: chalk.blue,
  RESOURCE: chalk.cyan,
  WATCH: chalk.yellow,
  UNKNOWN: chalk.gray,
}

/** 打印错误到 stderr，非 AppError 先包装 */
export function printError(error: unknown): void {
  const appError = error instanceof AppError ? error : AppError.unknown(error)
  console.error(appError.format())
}
