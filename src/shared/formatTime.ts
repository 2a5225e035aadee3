/**
 * 时间处理工具
 * 基于 date-fns 的轻量封装
 */

import { format, formatDistanceToNow, parseISO } from 'date-fns'
import { zhCN } from 'date-fns/locale'

// ISO 时间戳
export function now(): string {
  return new Date().toISOString()
}

// 相对时间（如 "3 分钟前"），CLI 状态表使用
export function formatRelative(isoString: string): string {
  return formatDistanceToNow(parseISO(isoString), {
    addSuffix: true,
    locale: zhCN,
  })
}

/** 毫秒时间戳 → 本地时间 "yyyy-MM-dd HH:mm:ss" */
export function formatTimestamp(epochMs: number): string {
  return format(new Date(epochMs), 'yyyy-MM-dd HH:mm:ss')
}

/**
 * 毫秒 → "HH:MM:SS"（125000 → "00:02:05"）
 * 小时不按 24 取模，超过一天的构建显示为 "27:00:00"
 */
export function formatClockDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000))
  const hours = Math.floor(totalSeconds / 3600)
  const minutes = Math.floor((totalSeconds % 3600) / 60)
  const seconds = totalSeconds % 60
  return [hours, minutes, seconds].map(n => n.toString().padStart(2, '0')).join(':')
}

// 格式化持续时间（日志用）
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  if (ms < 3600000) return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`
  return `${Math.floor(ms / 3600000)}h ${Math.floor((ms % 3600000) / 60000)}m`
}
