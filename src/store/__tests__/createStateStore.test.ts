/**
 * createStateStore 测试
 */

import { describe, it, expect } from 'vitest'
import { createStateStore } from '../createStateStore.js'
import { evaluateRun } from '../../runner/parseContract.js'
import type { CheckDefinition } from '../../checkfile/types.js'
import type { RunResult } from '../../types/runResult.js'
import type { CheckOutcome } from '../../types/checkState.js'

function def(name: string, section: string | null = null): CheckDefinition {
  return { name, command: `./${name}.sh`, sourcePath: '/checks/main', workingDirectory: '/checks', section, line: 1 }
}

function run(stdout: string, exitCode = 0): RunResult {
  return {
    command: './api.sh',
    cwd: '/checks',
    exitCode,
    signal: null,
    stdout,
    stderr: '',
    startedAt: '2024-03-01T10:00:00.000Z',
    durationMs: 12,
    timedOut: false,
    spawnError: null,
  }
}

const okOutcome: CheckOutcome = { status: 'ok', changing: false, url: null, info: [] }

describe('createStateStore', () => {
  it('should start every synced check as pending', () => {
    const store = createStateStore()
    store.sync([def('api', 'Backend'), def('web')])

    expect(store.snapshot()).toEqual([
      {
        name: 'api',
        section: 'Backend',
        status: 'pending',
        changing: false,
        url: null,
        info: [],
        lastRun: null,
        updatedAt: null,
      },
      {
        name: 'web',
        section: null,
        status: 'pending',
        changing: false,
        url: null,
        info: [],
        lastRun: null,
        updatedAt: null,
      },
    ])
  })

  it('should replace state objects instead of mutating them', () => {
    const store = createStateStore()
    store.sync([def('api')])
    const before = store.get('api')

    const after = store.apply('api', run('{"result": false}'), { ...okOutcome, status: 'failing' })

    expect(before?.status).toBe('pending')
    expect(after?.status).toBe('failing')
    expect(after).not.toBe(before)
    expect(Object.isFrozen(after)).toBe(true)
    expect(Object.isFrozen(after?.lastRun)).toBe(true)
  })

  it('should keep snapshots taken earlier unchanged', () => {
    const store = createStateStore()
    store.sync([def('api')])
    const first = store.snapshot()

    store.apply('api', run('{"result": true}'), okOutcome)

    expect(first[0]?.status).toBe('pending')
    expect(store.snapshot()[0]?.status).toBe('ok')
    expect(Object.isFrozen(first)).toBe(true)
  })

  it('should preserve the contract fields and info order through the snapshot', () => {
    const store = createStateStore()
    store.sync([def('deploy')])
    const stdout = JSON.stringify({
      result: true,
      changing: true,
      url: 'https://ci.example.test/job/deploy/7/console',
      info: [
        ['Zeta', '1'],
        ['Alpha', '2'],
        ['Mid', '3'],
      ],
    })

    const result = run(stdout)
    store.apply('deploy', result, evaluateRun(result))
    const roundTripped: unknown = JSON.parse(JSON.stringify(store.snapshot()))

    expect(roundTripped).toMatchObject([
      {
        status: 'ok',
        changing: true,
        url: 'https://ci.example.test/job/deploy/7/console',
        info: [
          ['Zeta', '1'],
          ['Alpha', '2'],
          ['Mid', '3'],
        ],
        lastRun: { stdout },
      },
    ])
  })

  it('should ignore results for checks that are no longer registered', () => {
    const store = createStateStore()
    store.sync([def('api')])
    store.sync([])

    expect(store.apply('api', run('{"result": true}'), okOutcome)).toBeNull()
    expect(store.size()).toBe(0)
  })

  it('should keep state of untouched checks and reset the changed ones', () => {
    const store = createStateStore()
    store.sync([def('a'), def('b')])
    store.apply('a', run('{"result": true}'), okOutcome)
    store.apply('b', run('{"result": true}'), okOutcome)

    store.sync([def('a'), def('b'), def('c')], { reset: ['b'] })

    expect(store.snapshot().map(s => [s.name, s.status])).toEqual([
      ['a', 'ok'],
      ['b', 'pending'],
      ['c', 'pending'],
    ])
    expect(store.history('a')).toHaveLength(1)
    expect(store.history('b')).toEqual([])
  })

  it('should update the section without losing the status', () => {
    const store = createStateStore()
    store.sync([def('api', 'Old')])
    store.apply('api', run('{"result": true}'), okOutcome)

    store.sync([def('api', 'New')])

    expect(store.get('api')).toMatchObject({ section: 'New', status: 'ok' })
  })

  it('should follow the order of the latest sync', () => {
    const store = createStateStore()
    store.sync([def('b'), def('a')])
    store.sync([def('a'), def('b')])

    expect(store.snapshot().map(s => s.name)).toEqual(['a', 'b'])
  })

  it('should bound the history to the configured limit', () => {
    const store = createStateStore({ historyLimit: 3 })
    store.sync([def('api')])

    for (let i = 1; i <= 5; i++) {
      store.apply('api', { ...run('{"result": true}'), durationMs: i }, okOutcome)
    }

    expect(store.history('api').map(r => r.run.durationMs)).toEqual([3, 4, 5])
  })

  it('should keep no history when the limit is zero', () => {
    const store = createStateStore({ historyLimit: 0 })
    store.sync([def('api')])
    store.apply('api', run('{"result": true}'), okOutcome)

    expect(store.history('api')).toEqual([])
    expect(store.get('api')?.status).toBe('ok')
  })

  it('should reject a negative history limit', () => {
    expect(() => createStateStore({ historyLimit: -1 })).toThrow('historyLimit must be a non-negative integer, got -1')
  })
})
