/**
 * @entry Registry 模块
 *
 * 合并 checkfile → 唯一的 check 集合；reload 时计算差异
 */

export type { CheckRegistry, RegistryCollision, RegistryDiff } from './types.js'
export { createCheckRegistry, mergeDefinitions, isSameExecution } from './createCheckRegistry.js'
