/**
 * @entry Jenkins 状态适配器
 *
 * - buildTreeSelector / buildJobUrl / buildRootUrl: 查询地址
 * - translateJob: job JSON → 结果契约
 * - runJenkinsCheck: 拉取 + 校验 + 翻译（fetcher 可替换）
 * - createJenkinsProgram / reportJenkinsStatus: checkpulse-jenkins 命令
 */

export { type FieldSpec, BUILD_FIELDS, JOB_FIELDS, buildTreeSelector } from './fields.js'
export { type JenkinsUrlOptions, buildJobUrl, buildRootUrl } from './urls.js'
export {
  type ChangeSetItem,
  type JenkinsBuild,
  type JenkinsJob,
  type JenkinsRoot,
  buildSchema,
  jobSchema,
  jobNameSchema,
  rootSchema,
} from './schema.js'
export { MISSING_COMMIT, SEPARATOR, findRevision, isPassingColor, translateJob } from './translateJob.js'
export { type UpstreamFetcher, curlFetcher } from './fetchUpstream.js'
export { type JenkinsCheckOptions, fetchJob, runJenkinsCheck } from './runJenkinsCheck.js'
export { type JenkinsCommandIO, createJenkinsProgram, reportJenkinsStatus } from './command.js'
