import type { CheckDefinition } from '../checkfile/types.js'

/** 同名 check 出现在多个 checkfile 中：按路径顺序后者覆盖前者 */
export interface RegistryCollision {
  readonly name: string
  readonly keptPath: string
  readonly droppedPath: string
}

export interface RegistryDiff {
  readonly added: readonly CheckDefinition[]
  readonly removed: readonly CheckDefinition[]
  /** 命令或工作目录变化，需要重新调度 */
  readonly changed: readonly CheckDefinition[]
  /** 命令与工作目录不变（分组、行号可能变了），定时器保持运行 */
  readonly unchanged: readonly CheckDefinition[]
  readonly collisions: readonly RegistryCollision[]
}

export interface CheckRegistry {
  reconcile(files: readonly { checks: readonly CheckDefinition[] }[]): RegistryDiff
  get(name: string): CheckDefinition | undefined
  has(name: string): boolean
  /** 按 checkfile 路径顺序、文件内行顺序 */
  list(): CheckDefinition[]
  size(): number
}
