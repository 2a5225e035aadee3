import { JOB_FIELDS, buildTreeSelector } from './fields.js'

export interface JenkinsUrlOptions {
  /** 追加 &pretty=true，方便人工查看返回内容 */
  pretty?: boolean
}

function trimBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '')
}

function withPretty(url: string, options: JenkinsUrlOptions): string {
  return options.pretty ? `${url}&pretty=true` : url
}

/** 单个 job：{base}/job/{job}/api/json?depth=1&tree=... */
export function buildJobUrl(baseUrl: string, job: string, options: JenkinsUrlOptions = {}): string {
  const tree = buildTreeSelector(JOB_FIELDS)
  return withPretty(`${trimBase(baseUrl)}/job/${encodeURIComponent(job)}/api/json?depth=1&tree=${tree}`, options)
}

/** 根 API：一次取全部 job，再按名字挑选 */
export function buildRootUrl(baseUrl: string, options: JenkinsUrlOptions = {}): string {
  const tree = `jobs\\[${buildTreeSelector(JOB_FIELDS)}\\]`
  return withPretty(`${trimBase(baseUrl)}/api/json?depth=2&tree=${tree}`, options)
}
