export type { RunResult } from './runResult.js'
export {
  type CheckStatus,
  type InfoPair,
  type CheckOutcome,
  type CheckState,
  type CheckSnapshot,
  type RunRecord,
  CHECK_STATUSES,
  isFailureStatus,
} from './checkState.js'
export type { ReloadSummary } from './reloadSummary.js'
