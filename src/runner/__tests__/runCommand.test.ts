/**
 * runCommand 测试（真实 /bin/sh 子进程）
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, writeFileSync, rmSync, chmodSync, realpathSync } from 'fs'
import { join, delimiter } from 'path'
import { tmpdir } from 'os'
import { runCommand, buildPath, createCommandExecutor, TIMEOUT_MARKER } from '../runCommand.js'
import type { CheckDefinition } from '../../checkfile/types.js'

let dir: string

function def(command: string, workingDirectory = dir): CheckDefinition {
  return { name: 'probe', command, sourcePath: join(dir, 'checks'), workingDirectory, section: null, line: 1 }
}

beforeEach(() => {
  dir = join(realpathSync(tmpdir()), `checkpulse-runner-${Date.now()}-${Math.random().toString(36).slice(2)}`)
  mkdirSync(dir, { recursive: true })
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

describe('buildPath', () => {
  it('should prepend the scripts directory', () => {
    expect(buildPath('/opt/scripts', '/usr/bin')).toBe(`/opt/scripts${delimiter}/usr/bin`)
  })

  it('should leave PATH alone without a scripts directory', () => {
    expect(buildPath(undefined, '/usr/bin')).toBe('/usr/bin')
  })
})

describe('runCommand', () => {
  it('should capture stdout and exit code', async () => {
    const run = await runCommand(def(`echo '{"result": true}'`))
    expect(run.exitCode).toBe(0)
    expect(run.stdout).toBe('{"result": true}\n')
    expect(run.spawnError).toBeNull()
    expect(run.timedOut).toBe(false)
    expect(run.command).toBe(`echo '{"result": true}'`)
  })

  it('should run inside the working directory', async () => {
    const run = await runCommand(def('pwd'))
    expect(run.stdout.trim()).toBe(dir)
    expect(run.cwd).toBe(dir)
  })

  it('should capture stderr and non-zero exit codes', async () => {
    const run = await runCommand(def('echo boom >&2; exit 3'))
    expect(run.exitCode).toBe(3)
    expect(run.stderr).toBe('boom\n')
    expect(run.spawnError).toBeNull()
  })

  it('should find executables in the scripts directory', async () => {
    const scripts = join(dir, 'scripts')
    mkdirSync(scripts)
    const script = join(scripts, 'hello.check')
    writeFileSync(script, '#!/bin/sh\necho \'{"result": false}\'\n')
    chmodSync(script, 0o755)

    const run = await runCommand(def('hello.check'), { scriptsDir: scripts })
    expect(run.exitCode).toBe(0)
    expect(run.stdout).toBe('{"result": false}\n')
  })

  it('should pass extra environment variables', async () => {
    const run = await runCommand(def('echo "$CHECK_TARGET"'), { env: { CHECK_TARGET: 'staging' } })
    expect(run.stdout).toBe('staging\n')
  })

  it('should kill the process group on timeout', async () => {
    const run = await runCommand(def('sleep 5; echo late'), { timeoutMs: 200 })
    expect(run.timedOut).toBe(true)
    expect(run.exitCode).toBeNull()
    expect(run.signal).toBe('SIGKILL')
    expect(run.stdout).toBe('')
    expect(run.stderr).toBe(`${TIMEOUT_MARKER} after 200ms\n`)
    expect(run.durationMs).toBeLessThan(4000)
  })

  it('should kill the process group when the signal aborts', async () => {
    const controller = new AbortController()
    const pending = runCommand(def('sleep 5 & sleep 5; echo late'), { signal: controller.signal })
    setTimeout(() => controller.abort(), 200)

    const run = await pending
    expect(run.signal).toBe('SIGKILL')
    expect(run.timedOut).toBe(false)
    expect(run.stdout).toBe('')
    expect(run.durationMs).toBeLessThan(4000)
  })

  it('should kill right away when the signal is already aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const run = await runCommand(def('sleep 5'), { signal: controller.signal })
    expect(run.signal).toBe('SIGKILL')
    expect(run.durationMs).toBeLessThan(4000)
  })

  it('should report a spawn failure instead of throwing', async () => {
    const run = await runCommand(def('true', join(dir, 'missing')))
    expect(run.spawnError).toEqual(expect.any(String))
    expect(run.exitCode).toBeNull()
    expect(run.timedOut).toBe(false)
  })
})

describe('createCommandExecutor', () => {
  it('abortAll should kill in-flight commands and leave later runs alone', async () => {
    const executor = createCommandExecutor()
    const stuck = executor(def('sleep 5'))
    setTimeout(() => executor.abortAll?.(), 200)

    const killed = await stuck
    expect(killed.signal).toBe('SIGKILL')

    const next = await executor(def(`echo '{"result": true}'`))
    expect(next.signal).toBeNull()
    expect(next.exitCode).toBe(0)
  })
})
