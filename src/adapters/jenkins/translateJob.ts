/**
 * Jenkins job → 结果契约
 *
 * info 顺序：Build, Duration, Started, SHA, Author, 然后是 Recents（新 → 旧），
 * 最后一次构建不是最后一次成功构建时再追加 Last Successful Build 块。
 */

import { formatClockDuration, formatTimestamp } from '../../shared/formatTime.js'
import type { CheckContract } from '../../runner/parseContract.js'
import type { InfoPair } from '../../types/checkState.js'
import type { JenkinsBuild, JenkinsJob } from './schema.js'

const PASSING_COLORS = new Set(['blue', 'blue_anime'])
const SHORT_SHA_LENGTH = 6

export const SEPARATOR: InfoPair = ['-', '']
export const MISSING_COMMIT = '<missing>'

function shortSha(sha: string): string {
  return sha.slice(0, SHORT_SHA_LENGTH)
}

/** 第一个带 lastBuiltRevision.SHA1 的 action */
export function findRevision(build: JenkinsBuild): string | null {
  for (const action of build.actions) {
    const sha = action?.lastBuiltRevision?.SHA1
    if (sha) return sha
  }
  return null
}

function buildSummary(build: JenkinsBuild): InfoPair[] {
  const info: InfoPair[] = [
    ['Build', build.fullDisplayName],
    ['Duration', formatClockDuration(build.duration)],
    ['Started', formatTimestamp(build.timestamp)],
  ]
  const sha = findRevision(build)
  if (sha) info.push(['SHA', shortSha(sha)])
  return info
}

function recentChanges(build: JenkinsBuild): InfoPair[] {
  const items = build.changeSet?.items ?? []
  if (items.length === 0) return []

  const info: InfoPair[] = []
  const author = items[items.length - 1]?.author?.fullName
  if (author) info.push(['Author', author])

  info.push(SEPARATOR, ['Recents', ''])
  for (const item of [...items].reverse()) {
    info.push([` - ${item.msg}`, item.commitId ? shortSha(item.commitId) : MISSING_COMMIT])
  }
  return info
}

function lastSuccessfulBlock(build: JenkinsBuild): InfoPair[] {
  const info: InfoPair[] = [
    SEPARATOR,
    ['Last Successful Build', ''],
    ['  Name', build.fullDisplayName],
    ['  Duration', formatClockDuration(build.duration)],
  ]
  const sha = findRevision(build)
  if (sha) info.push(['  SHA', shortSha(sha)])
  info.push(['  Started', formatTimestamp(build.timestamp)])
  return info
}

export function isPassingColor(color: string): boolean {
  return PASSING_COLORS.has(color)
}

export function translateJob(job: JenkinsJob): CheckContract {
  const result = isPassingColor(job.color)
  const last = job.lastBuild

  // 从未构建过
  if (!last) {
    return { result, changing: job.color.endsWith('_anime'), url: null, info: [['Build', 'none']] }
  }

  const info = [...buildSummary(last), ...recentChanges(last)]
  const lastSuccessful = job.lastSuccessfulBuild
  if (lastSuccessful && lastSuccessful.id !== last.id) {
    info.push(...lastSuccessfulBlock(lastSuccessful))
  }

  return {
    result,
    changing: last.building,
    url: `${last.url}console`,
    info: info.map(([label, value]): [string, string] => [label, value]),
  }
}
