/**
 * Check Registry
 *
 * 合并所有 checkfile 的定义，得到唯一的 name → CheckDefinition 映射；
 * reload 时与当前集合比较，得出 added / removed / changed / unchanged。
 */

import { createLogger } from '../shared/logger.js'
import type { CheckDefinition } from '../checkfile/types.js'
import type { CheckRegistry, RegistryCollision, RegistryDiff } from './types.js'

const logger = createLogger('registry')

interface MergeResult {
  definitions: Map<string, CheckDefinition>
  collisions: RegistryCollision[]
}

/**
 * 按输入顺序合并（调用方保证 checkfile 已按路径排序）
 * 同名冲突时后出现的文件覆盖前者，记录一条冲突
 */
export function mergeDefinitions(files: readonly { checks: readonly CheckDefinition[] }[]): MergeResult {
  const definitions = new Map<string, CheckDefinition>()
  const collisions: RegistryCollision[] = []

  for (const file of files) {
    for (const def of file.checks) {
      const existing = definitions.get(def.name)
      if (existing) {
        collisions.push({ name: def.name, keptPath: def.sourcePath, droppedPath: existing.sourcePath })
        logger.warn(`Check "${def.name}" in ${def.sourcePath} overrides ${existing.sourcePath}`)
        definitions.delete(def.name)
      }
      definitions.set(def.name, def)
    }
  }

  return { definitions, collisions }
}

/** 命令或工作目录不同才算变更 */
export function isSameExecution(a: CheckDefinition, b: CheckDefinition): boolean {
  return a.command === b.command && a.workingDirectory === b.workingDirectory
}

export function createCheckRegistry(): CheckRegistry {
  let current = new Map<string, CheckDefinition>()

  return {
    reconcile(files): RegistryDiff {
      const { definitions: next, collisions } = mergeDefinitions(files)

      const added: CheckDefinition[] = []
      const changed: CheckDefinition[] = []
      const unchanged: CheckDefinition[] = []
      const removed: CheckDefinition[] = []

      for (const def of next.values()) {
        const previous = current.get(def.name)
        if (!previous) added.push(def)
        else if (isSameExecution(previous, def)) unchanged.push(def)
        else changed.push(def)
      }

      for (const def of current.values()) {
        if (!next.has(def.name)) removed.push(def)
      }

      current = next
      logger.debug(
        `Reconciled: +${added.length} -${removed.length} ~${changed.length} =${unchanged.length}`
      )

      return { added, removed, changed, unchanged, collisions }
    },

    get(name) {
      return current.get(name)
    },

    has(name) {
      return current.has(name)
    },

    list() {
      return [...current.values()]
    },

    size() {
      return current.size
    },
  }
}
