/**
 * @entry Checkfile 模块
 *
 * - parseCheckfile: 文本 → check 定义 + 分组 + 诊断（纯函数）
 * - discoverCheckfiles: 递归查找（跟随软链接，排除隐藏文件）
 * - loadCheckfiles: 发现 + 读取 + 解析
 */

export type {
  CheckDefinition,
  CheckfileSection,
  CheckfileSource,
  ParseDiagnostic,
  ParsedCheckfile,
} from './types.js'
export { parseCheckfile, type ParseCheckfileOptions } from './parseCheckfile.js'
export { discoverCheckfiles, isHiddenName, type DiscoveryResult } from './discoverCheckfiles.js'
export { loadCheckfiles, type LoadedCheckfiles } from './loadCheckfiles.js'
