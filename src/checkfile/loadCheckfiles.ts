/**
 * 读取并解析根目录下全部 checkfile
 * 单个文件读取失败只记日志并跳过，不影响其它文件
 */

import { readFile } from 'fs/promises'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { discoverCheckfiles } from './discoverCheckfiles.js'
import { parseCheckfile } from './parseCheckfile.js'
import type { ParsedCheckfile } from './types.js'

const logger = createLogger('checkfile')

export interface LoadedCheckfiles {
  files: ParsedCheckfile[]
  directories: string[]
  /** 读取失败的文件 */
  failures: AppError[]
}

export async function loadCheckfiles(root: string): Promise<LoadedCheckfiles> {
  const { files: sources, directories } = await discoverCheckfiles(root)
  const files: ParsedCheckfile[] = []
  const failures: AppError[] = []

  for (const source of sources) {
    if (source.hidden) continue

    let text: string
    try {
      text = await readFile(source.realPath, 'utf-8')
    } catch (error) {
      const failure = AppError.checkfileRead(source.path, error)
      logger.warn(failure.message)
      failures.push(failure)
      continue
    }

    const parsed = parseCheckfile(text, { path: source.path, realPath: source.realPath })
    for (const diagnostic of parsed.diagnostics) {
      logger.warn(`${diagnostic.path}:${diagnostic.line} ${diagnostic.message}`)
    }
    files.push(parsed)
  }

  logger.debug(`Loaded ${files.length} checkfile(s) from ${root}`)
  return { files, directories, failures }
}
