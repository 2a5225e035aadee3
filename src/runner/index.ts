/**
 * @entry Runner 模块
 *
 * - runCommand: 子进程执行 check 命令（execa），得到 RunResult
 * - evaluateRun / parseContract: stdout → 结果契约 → CheckOutcome
 */

export {
  runCommand,
  createCommandExecutor,
  buildPath,
  TIMEOUT_MARKER,
  type RunCommandOptions,
  type CommandExecutor,
} from './runCommand.js'
export {
  parseContract,
  evaluateRun,
  errorOutcome,
  buildErrorInfo,
  contractSchema,
  infoPairSchema,
  type CheckContract,
} from './parseContract.js'
