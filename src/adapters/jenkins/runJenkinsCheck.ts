/**
 * 拉取 Jenkins job 状态并翻译成结果契约
 *
 * 拉取失败、返回内容不是合法 JSON、root 模式下找不到 job 都以 AppError 抛出，
 * 由 CLI 输出到 stderr 并以非 0 退出。
 */

import type { z } from 'zod'
import { createLogger } from '../../shared/logger.js'
import { AppError } from '../../shared/error.js'
import { fromThrowable } from '../../shared/result.js'
import type { CheckContract } from '../../runner/parseContract.js'
import { curlFetcher, type UpstreamFetcher } from './fetchUpstream.js'
import { jobNameSchema, jobSchema, rootSchema, type JenkinsJob } from './schema.js'
import { translateJob } from './translateJob.js'
import { buildJobUrl, buildRootUrl } from './urls.js'

const logger = createLogger('jenkins')

export interface JenkinsCheckOptions {
  baseUrl: string
  job: string
  /** 通过根 API 查询全部 job 再按名字挑选 */
  rootApi?: boolean
  prettyApi?: boolean
  fetcher?: UpstreamFetcher
}

async function fetchJson(url: string, fetcher: UpstreamFetcher): Promise<unknown> {
  let body: string
  try {
    body = await fetcher(url)
  } catch (error) {
    throw AppError.upstreamFetch(url, error)
  }

  const parsed = fromThrowable((): unknown => JSON.parse(body))
  if (!parsed.ok) throw AppError.upstreamParse(url, parsed.error)
  return parsed.value
}

function validate<S extends z.ZodTypeAny>(schema: S, value: unknown, url: string): z.output<S> {
  const result = schema.safeParse(value)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    throw AppError.upstreamParse(url, new Error(`${where}${issue?.message ?? 'invalid response'}`))
  }
  return result.data
}

export async function fetchJob(options: JenkinsCheckOptions): Promise<JenkinsJob> {
  const fetcher = options.fetcher ?? curlFetcher
  const urlOptions = { pretty: options.prettyApi }

  if (options.rootApi) {
    const url = buildRootUrl(options.baseUrl, urlOptions)
    logger.debug(`Fetching ${url}`)
    const root = validate(rootSchema, await fetchJson(url, fetcher), url)
    const entry = root.jobs.find(j => {
      const named = jobNameSchema.safeParse(j)
      return named.success && named.data.name === options.job
    })
    if (entry === undefined) throw AppError.jobNotFound(options.job)
    return validate(jobSchema, entry, url)
  }

  const url = buildJobUrl(options.baseUrl, options.job, urlOptions)
  logger.debug(`Fetching ${url}`)
  return validate(jobSchema, await fetchJson(url, fetcher), url)
}

export async function runJenkinsCheck(options: JenkinsCheckOptions): Promise<CheckContract> {
  return translateJob(await fetchJob(options))
}
