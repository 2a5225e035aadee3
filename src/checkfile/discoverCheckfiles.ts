/**
 * Checkfile 发现
 *
 * 从根目录递归查找，跟随软链接（目录和文件都跟随），以真实路径去重防止软链接成环。
 * 以 "." 开头的目录不进入；以 "." 开头的文件标记为 hidden，加载时整体排除。
 */

import { readdir, realpath, stat } from 'fs/promises'
import { join } from 'path'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { AppError } from '../shared/error.js'
import type { CheckfileSource } from './types.js'

const logger = createLogger('checkfile')

export interface DiscoveryResult {
  /** 按 path 字典序排列，registry 合并时依赖这个顺序 */
  files: CheckfileSource[]
  /** 遍历过的目录真实路径（含根目录），watcher 监听这些目录 */
  directories: string[]
}

export function isHiddenName(name: string): boolean {
  return name.startsWith('.')
}

export async function discoverCheckfiles(root: string): Promise<DiscoveryResult> {
  let rootReal: string
  try {
    rootReal = await realpath(root)
    const rootStat = await stat(rootReal)
    if (!rootStat.isDirectory()) throw new Error('not a directory')
  } catch (error) {
    throw AppError.checksDirNotFound(root, error)
  }

  const files: CheckfileSource[] = []
  const directories: string[] = []
  const visitedDirs = new Set<string>()

  async function walk(dir: string, dirReal: string): Promise<void> {
    if (visitedDirs.has(dirReal)) return
    visitedDirs.add(dirReal)
    directories.push(dirReal)

    let entries: string[]
    try {
      entries = await readdir(dir)
    } catch (error) {
      if (dirReal === rootReal) throw AppError.checksDirNotFound(root, error)
      logger.warn(`Cannot read directory ${dir}: ${getErrorMessage(error)}`)
      return
    }

    for (const name of entries.sort()) {
      const entryPath = join(dir, name)
      const hidden = isHiddenName(name)

      let entryReal: string
      let isDirectory: boolean
      let isFile: boolean
      try {
        entryReal = await realpath(entryPath)
        const entryStat = await stat(entryReal)
        isDirectory = entryStat.isDirectory()
        isFile = entryStat.isFile()
      } catch (error) {
        // 悬空软链接或读取期间被删除
        logger.debug(`Skipping ${entryPath}: ${getErrorMessage(error)}`)
        continue
      }

      if (isDirectory) {
        if (!hidden) await walk(entryPath, entryReal)
      } else if (isFile) {
        files.push({ path: entryPath, realPath: entryReal, hidden })
      }
    }
  }

  await walk(root, rootReal)
  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
  return { files, directories }
}
