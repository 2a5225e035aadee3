/**
 * @entry Shared 公共基础设施模块
 *
 * 底层工具函数，无业务逻辑依赖
 *
 * 能力分组：
 * - Result<T,E>: 预期内失败的显式返回（ok/err/fromThrowable）
 * - AppError: 统一错误类型（错误码 + 修复建议，printError 输出到 stderr）
 * - Logger: 日志系统（createLogger/setLogLevel/logError/flushLogs，JSON Lines 格式化）
 * - 错误守卫: getErrorMessage/ensureError
 * - 文本: truncateText
 * - 事件总线: createCheckEventBus（orchestrator → CLI 的状态推送）
 * - 时间: now/formatRelative/formatTimestamp/formatClockDuration/formatDuration
 */

// Result 类型
export { type Result, ok, err, fromThrowable } from './result.js'

// 错误类型
export { type ErrorCode, type ErrorCategory, AppError, printError } from './error.js'

// 日志
export {
  type LogLevel,
  type LogMode,
  type Logger,
  type LoggerOptions,
  type ErrorContext,
  type JsonLogEntry,
  setLogLevel,
  createLogger,
  logError,
  flushLogs,
  stripAnsi,
  formatJsonLogEntry,
} from './logger.js'

// 错误类型守卫与消息提取
export { getErrorMessage, ensureError } from './assertError.js'

// 文本截断
export { truncateText } from './truncateText.js'

// 事件总线
export {
  type CheckEventMap,
  type CheckEventName,
  type CheckEventListener,
  type CheckEventBus,
  createCheckEventBus,
} from './events/checkEvents.js'

// 时间处理
export { now, formatRelative, formatTimestamp, formatClockDuration, formatDuration } from './formatTime.js'
