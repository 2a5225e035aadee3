/**
 * @entry Orchestrator
 *
 * 构造并持有 registry / scheduler / store / watcher，对 UI 暴露只读快照和 runNow
 */

export {
  type Orchestrator,
  type OrchestratorOptions,
  type OrchestratorStatus,
  createOrchestrator,
} from './createOrchestrator.js'
