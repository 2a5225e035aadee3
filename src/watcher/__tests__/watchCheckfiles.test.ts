/**
 * watchCheckfiles 测试（真实目录 + fs.watch）
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { watchCheckfiles, type CheckfileWatcher } from '../watchCheckfiles.js'

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms))

describe('watchCheckfiles', () => {
  let root: string
  let watcher: CheckfileWatcher | null = null

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'checkpulse-watch-'))
  })

  afterEach(() => {
    watcher?.close()
    watcher = null
    rmSync(root, { recursive: true, force: true })
  })

  it('should collapse a burst of changes into one callback', async () => {
    const onChange = vi.fn()
    watcher = watchCheckfiles([root], { onChange, onError: vi.fn(), debounceMs: 100 })

    writeFileSync(join(root, 'a'), 'one: echo 1\n')
    writeFileSync(join(root, 'b'), 'two: echo 2\n')
    writeFileSync(join(root, 'a'), 'one: echo 11\n')

    await vi.waitFor(() => expect(onChange).toHaveBeenCalled(), { timeout: 2000 })
    await sleep(300)
    expect(onChange).toHaveBeenCalledTimes(1)
  })

  it('should ignore hidden files', async () => {
    const onChange = vi.fn()
    watcher = watchCheckfiles([root], { onChange, onError: vi.fn(), debounceMs: 50 })

    writeFileSync(join(root, '.main.swp'), 'x')
    await sleep(300)

    expect(onChange).not.toHaveBeenCalled()
  })

  it('should pick up directories added through update', async () => {
    const nested = join(root, 'nested')
    mkdirSync(nested)
    const onChange = vi.fn()
    watcher = watchCheckfiles([root], { onChange, onError: vi.fn(), debounceMs: 50 })
    await sleep(50)
    onChange.mockClear()

    watcher.update([root, nested])
    expect(watcher.watched()).toEqual([root, nested])

    writeFileSync(join(nested, 'ci'), 'build: echo ok\n')
    await vi.waitFor(() => expect(onChange).toHaveBeenCalled(), { timeout: 2000 })
  })

  it('should stop watching directories dropped by update', () => {
    const nested = join(root, 'nested')
    mkdirSync(nested)
    watcher = watchCheckfiles([root, nested], { onChange: vi.fn(), onError: vi.fn() })

    watcher.update([root])

    expect(watcher.watched()).toEqual([root])
  })

  it('should report a failure once and degrade', () => {
    const onError = vi.fn()
    const missing = join(root, 'missing')
    watcher = watchCheckfiles([root, missing], { onChange: vi.fn(), onError })

    expect(onError).toHaveBeenCalledTimes(1)
    expect(onError.mock.calls[0]?.[0]).toMatchObject({ code: 'WATCH_FAILED', category: 'WATCH' })
    expect(watcher.isActive()).toBe(false)
    expect(watcher.watched()).toEqual([])

    watcher.update([root, missing])
    expect(onError).toHaveBeenCalledTimes(1)
    expect(watcher.watched()).toEqual([])
  })

  it('should not call back after close', async () => {
    const onChange = vi.fn()
    watcher = watchCheckfiles([root], { onChange, onError: vi.fn(), debounceMs: 50 })
    watcher.close()

    writeFileSync(join(root, 'a'), 'one: echo 1\n')
    await sleep(200)

    expect(onChange).not.toHaveBeenCalled()
    expect(watcher.isActive()).toBe(false)
  })
})
