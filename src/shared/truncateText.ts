/**
 * 截断为单行显示文本
 *
 * 换行和连续空白折叠成一个空格；超长时以 suffix 结尾，总长不超过 maxLength
 * - 表格摘要: 48
 * - stderr 首行: 200
 */
export function truncateText(text: string, maxLength: number = 48, suffix: string = '...'): string {
  const singleLine = text.replace(/\s+/g, ' ').trim()
  if (singleLine.length <= maxLength) return singleLine
  return singleLine.slice(0, Math.max(0, maxLength - suffix.length)) + suffix
}
