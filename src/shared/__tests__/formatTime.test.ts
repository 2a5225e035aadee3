import { describe, it, expect } from 'vitest'
import { formatClockDuration, formatDuration, formatTimestamp } from '../formatTime.js'

describe('formatClockDuration', () => {
  it('pads hours, minutes and seconds', () => {
    expect(formatClockDuration(125000)).toBe('00:02:05')
  })

  it('drops sub-second remainder', () => {
    expect(formatClockDuration(1999)).toBe('00:00:01')
  })

  it('does not wrap hours at a day', () => {
    expect(formatClockDuration(27 * 3600 * 1000)).toBe('27:00:00')
  })

  it('clamps negative durations to zero', () => {
    expect(formatClockDuration(-5000)).toBe('00:00:00')
  })
})

describe('formatDuration', () => {
  it('picks a unit by magnitude', () => {
    expect(formatDuration(500)).toBe('500ms')
    expect(formatDuration(1500)).toBe('1.5s')
    expect(formatDuration(125000)).toBe('2m 5s')
    expect(formatDuration(3720000)).toBe('1h 2m')
  })
})

describe('formatTimestamp', () => {
  it('formats epoch milliseconds in local time', () => {
    const epochMs = new Date(2024, 0, 2, 3, 4, 5).getTime()
    expect(formatTimestamp(epochMs)).toBe('2024-01-02 03:04:05')
  })
})
