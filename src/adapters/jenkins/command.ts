/**
 * checkpulse-jenkins 命令定义
 *
 * stdout 输出结果契约 JSON；失败时诊断信息写 stderr，退出码 1
 */

import { Command } from 'commander'
import { getErrorMessage } from '../../shared/assertError.js'
import { flushLogs, setLogLevel } from '../../shared/logger.js'
import type { UpstreamFetcher } from './fetchUpstream.js'
import { runJenkinsCheck, type JenkinsCheckOptions } from './runJenkinsCheck.js'

export interface JenkinsCommandIO {
  out: (line: string) => void
  err: (line: string) => void
  /** 不传则用 curl */
  fetcher?: UpstreamFetcher
}

interface JenkinsCliOptions {
  rootApi?: boolean
  prettyApi?: boolean
  verbose?: boolean
}

const consoleIO: JenkinsCommandIO = {
  out: line => console.log(line),
  err: line => console.error(line),
}

/** 执行一次查询并输出，返回退出码 */
export async function reportJenkinsStatus(
  options: Omit<JenkinsCheckOptions, 'fetcher'>,
  io: JenkinsCommandIO = consoleIO
): Promise<number> {
  try {
    const contract = await runJenkinsCheck({ ...options, fetcher: io.fetcher })
    io.out(JSON.stringify(contract))
    return 0
  } catch (error) {
    io.err(`checkpulse-jenkins: ${getErrorMessage(error)}`)
    return 1
  }
}

export function createJenkinsProgram(io: JenkinsCommandIO = consoleIO): Command {
  return new Command()
    .name('checkpulse-jenkins')
    .description('Report the status of a Jenkins job as a checkpulse result')
    .argument('<jenkinsBaseUrl>', 'Jenkins 地址，如 https://ci.example.com')
    .argument('<jobName>', 'job 名称')
    .option('--root-api', '通过根 API 查询全部 job 再按名字挑选')
    .option('--pretty-api', '请求带上 pretty=true（仅用于排查）')
    .option('-v, --verbose', '显示详细日志 (debug 级别)')
    .action(async (baseUrl: string, job: string, options: JenkinsCliOptions) => {
      if (options.verbose) setLogLevel('debug')
      try {
        const code = await reportJenkinsStatus(
          { baseUrl, job, rootApi: options.rootApi, prettyApi: options.prettyApi },
          io
        )
        if (code !== 0) process.exitCode = code
      } finally {
        flushLogs()
      }
    })
}
