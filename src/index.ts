/**
 * @entry checkpulse 库入口
 *
 * 嵌入方（状态栏、面板等 UI）只需要这里导出的内容：
 * - createOrchestrator + createCommandExecutor: 启动、reload、快照、立即执行
 * - 类型: CheckSnapshot / RunRecord / ReloadSummary 等只读视图
 * - Jenkins 适配器: 可以直接在进程内调用，不经过 checkfile
 */

export * from './types/index.js'
export {
  type Orchestrator,
  type OrchestratorOptions,
  type OrchestratorStatus,
  createOrchestrator,
} from './orchestrator/index.js'
export {
  type CommandExecutor,
  type RunCommandOptions,
  type CheckContract,
  createCommandExecutor,
  parseContract,
  evaluateRun,
} from './runner/index.js'
export { type CheckDefinition, type ParsedCheckfile, parseCheckfile, loadCheckfiles } from './checkfile/index.js'
export { type Config, loadConfig } from './config/index.js'
export {
  type CheckEventBus,
  type CheckEventMap,
  AppError,
  setLogLevel,
  flushLogs,
} from './shared/index.js'
export * as jenkins from './adapters/jenkins/index.js'
