import { describe, it, expect } from 'vitest'
import { formatJsonLogEntry, stripAnsi } from '../logger.js'

describe('stripAnsi', () => {
  it('removes color codes', () => {
    expect(stripAnsi('\x1b[32m✓ ok\x1b[39m')).toBe('✓ ok')
  })
})

describe('formatJsonLogEntry', () => {
  it('writes one JSON object with scope and data', () => {
    const line = formatJsonLogEntry('warn', 'run', '\x1b[31mapi failing\x1b[39m', { exitCode: 1 })
    expect(line).not.toContain('\n')
    const entry: unknown = JSON.parse(line)
    expect(entry).toMatchObject({ level: 'warn', scope: 'run', message: 'api failing', data: { exitCode: 1 } })
    expect(entry).toHaveProperty('timestamp', expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/))
  })

  it('omits empty scope and data', () => {
    const entry: unknown = JSON.parse(formatJsonLogEntry('info', '', 'reloaded'))
    expect(entry).not.toHaveProperty('scope')
    expect(entry).not.toHaveProperty('data')
  })
})
