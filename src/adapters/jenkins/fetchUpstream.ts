/**
 * 上游 HTTP 拉取
 *
 * 默认用 curl：tree 参数里的 \[ \] 由 curl 还原成方括号
 */

import { execa, ExecaError } from 'execa'

export type UpstreamFetcher = (url: string) => Promise<string>

export const curlFetcher: UpstreamFetcher = async url => {
  try {
    const { stdout } = await execa('curl', ['--silent', '--show-error', '--fail', '--location', url], {
      stripFinalNewline: false,
    })
    return stdout
  } catch (error) {
    if (error instanceof ExecaError) {
      const detail = typeof error.stderr === 'string' && error.stderr.trim() ? error.stderr.trim() : error.shortMessage
      throw new Error(detail, { cause: error })
    }
    throw error
  }
}
