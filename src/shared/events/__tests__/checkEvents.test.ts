import { describe, it, expect, vi } from 'vitest'
import { createCheckEventBus } from '../checkEvents.js'
import type { CheckSnapshot } from '../../../types/checkState.js'
import type { ReloadSummary } from '../../../types/reloadSummary.js'

const state: CheckSnapshot = {
  name: 'api',
  section: null,
  status: 'ok',
  changing: false,
  url: null,
  info: [],
  lastRun: null,
  updatedAt: '2024-03-01T10:00:00.000Z',
}

const summary: ReloadSummary = {
  checksDir: '/checks',
  added: ['api'],
  removed: [],
  changed: [],
  total: 1,
  collisions: 0,
  diagnostics: 0,
  failures: [],
}

describe('createCheckEventBus', () => {
  it('should deliver payloads to listeners of that event only', () => {
    const bus = createCheckEventBus()
    const onUpdated = vi.fn()
    const onReloaded = vi.fn()
    bus.on('check:updated', onUpdated)
    bus.on('checks:reloaded', onReloaded)

    bus.emit('check:updated', state)

    expect(onUpdated).toHaveBeenCalledWith(state)
    expect(onReloaded).not.toHaveBeenCalled()
  })

  it('should stop delivering after unsubscribe', () => {
    const bus = createCheckEventBus()
    const handler = vi.fn()
    const off = bus.on('checks:reloaded', handler)

    off()
    bus.emit('checks:reloaded', summary)

    expect(handler).not.toHaveBeenCalled()
    expect(bus.listenerCount('checks:reloaded')).toBe(0)
  })

  it('should deliver once listeners a single time', () => {
    const bus = createCheckEventBus()
    const handler = vi.fn()
    bus.once('check:updated', handler)

    bus.emit('check:updated', state)
    bus.emit('check:updated', state)

    expect(handler).toHaveBeenCalledTimes(1)
  })

  it('should isolate a throwing listener from the others', () => {
    const bus = createCheckEventBus()
    const after = vi.fn()
    bus.on('check:updated', () => {
      throw new Error('listener broke')
    })
    bus.on('check:updated', after)

    expect(() => bus.emit('check:updated', state)).not.toThrow()
    expect(after).toHaveBeenCalledWith(state)
  })

  it('should swallow rejections of async listeners', async () => {
    const bus = createCheckEventBus()
    bus.on('check:updated', async () => {
      throw new Error('async broke')
    })

    expect(bus.emit('check:updated', state)).toBe(true)
    await new Promise(resolve => setTimeout(resolve, 0))
  })

  it('should report whether anyone was listening', () => {
    const bus = createCheckEventBus()
    expect(bus.emit('checks:reloaded', summary)).toBe(false)
  })
})
