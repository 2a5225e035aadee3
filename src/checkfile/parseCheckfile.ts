/**
 * Checkfile 解析
 *
 * 文件格式（逐行）：
 *   #- 标题        新分组，标题为 "标题"
 *   #-             无标题分组（视觉分隔）
 *   # 任意内容     注释
 *   名称: 命令     check 定义，名称取第一个 ": " 之前的部分
 *
 * 纯函数：相同输入必然得到相同输出，不读文件系统
 */

import { dirname } from 'path'
import type { CheckDefinition, CheckfileSection, ParseDiagnostic, ParsedCheckfile } from './types.js'

const SECTION_PATTERN = /^#-(?:\s+(.*))?$/
const NAME_SEPARATOR = ': '

export interface ParseCheckfileOptions {
  path: string
  /** 软链接解析后的真实路径，缺省视为与 path 相同 */
  realPath?: string
}

export function parseCheckfile(text: string, options: ParseCheckfileOptions): ParsedCheckfile {
  const { path } = options
  const realPath = options.realPath ?? path
  const workingDirectory = dirname(realPath)

  const byName = new Map<string, CheckDefinition>()
  const sections: CheckfileSection[] = []
  const diagnostics: ParseDiagnostic[] = []
  let section: string | null = null

  const lines = text.split(/\r?\n/)
  lines.forEach((raw, index) => {
    const lineNo = index + 1
    const trimmed = raw.trim()
    if (!trimmed) return

    const sectionMatch = SECTION_PATTERN.exec(trimmed)
    if (sectionMatch) {
      const title = sectionMatch[1]?.trim() || null
      section = title
      sections.push({ title, line: lineNo })
      return
    }

    if (trimmed.startsWith('#')) return

    const separatorAt = trimmed.indexOf(NAME_SEPARATOR)
    if (separatorAt === -1) {
      diagnostics.push({ path, line: lineNo, text: raw, message: 'Expected "<name>: <command>"' })
      return
    }

    const name = trimmed.slice(0, separatorAt).trim()
    const command = trimmed.slice(separatorAt + NAME_SEPARATOR.length).trim()
    if (!name) {
      diagnostics.push({ path, line: lineNo, text: raw, message: 'Check name is empty' })
      return
    }

    const previous = byName.get(name)
    if (previous) {
      diagnostics.push({
        path,
        line: lineNo,
        text: raw,
        message: `Duplicate check "${name}" (line ${previous.line} is replaced)`,
      })
      // 保持后出现的定义，但位置按新行排列
      byName.delete(name)
    }

    byName.set(name, { name, command, sourcePath: path, workingDirectory, section, line: lineNo })
  })

  return {
    path,
    realPath,
    checks: [...byName.values()],
    sections,
    diagnostics,
  }
}
