/**
 * parseCheckfile 测试
 */

import { describe, it, expect } from 'vitest'
import { parseCheckfile } from '../parseCheckfile.js'

const PATH = '/home/me/Checkpulse/ci'

describe('parseCheckfile', () => {
  it('should parse name/command lines with the real directory as cwd', () => {
    const parsed = parseCheckfile('api: curl -sf localhost:8080/health\nweb: site.check example.com\n', {
      path: PATH,
      realPath: '/opt/shared/checks/ci',
    })

    expect(parsed.checks).toEqual([
      {
        name: 'api',
        command: 'curl -sf localhost:8080/health',
        sourcePath: PATH,
        workingDirectory: '/opt/shared/checks',
        section: null,
        line: 1,
      },
      {
        name: 'web',
        command: 'site.check example.com',
        sourcePath: PATH,
        workingDirectory: '/opt/shared/checks',
        section: null,
        line: 2,
      },
    ])
    expect(parsed.diagnostics).toEqual([])
  })

  it('should split on the first colon-space only', () => {
    const parsed = parseCheckfile('db: psql -c "select 1: ok"', { path: PATH })
    expect(parsed.checks[0]?.name).toBe('db')
    expect(parsed.checks[0]?.command).toBe('psql -c "select 1: ok"')
  })

  it('should keep colons without a following space inside the name', () => {
    const parsed = parseCheckfile('host:8080: nc -z host 8080', { path: PATH })
    expect(parsed.checks[0]?.name).toBe('host:8080')
  })

  it('should trim surrounding whitespace from the command', () => {
    const parsed = parseCheckfile('build:    make check   ', { path: PATH })
    expect(parsed.checks[0]?.command).toBe('make check')
  })

  it('should assign section titles from #- separators', () => {
    const text = ['#- Production', 'api: true', '#-', 'misc: true', '#- Staging', 'stage: true'].join('\n')
    const parsed = parseCheckfile(text, { path: PATH })

    expect(parsed.checks.map(c => [c.name, c.section])).toEqual([
      ['api', 'Production'],
      ['misc', null],
      ['stage', 'Staging'],
    ])
    expect(parsed.sections).toEqual([
      { title: 'Production', line: 1 },
      { title: null, line: 3 },
      { title: 'Staging', line: 5 },
    ])
  })

  it('should ignore comments and blank lines', () => {
    const text = '# a comment\n\n   \n#-not-a-separator\napi: true\n'
    const parsed = parseCheckfile(text, { path: PATH })
    expect(parsed.checks.map(c => c.name)).toEqual(['api'])
    expect(parsed.sections).toEqual([])
    expect(parsed.diagnostics).toEqual([])
  })

  it('should handle CRLF line endings', () => {
    const parsed = parseCheckfile('a: echo 1\r\nb: echo 2\r\n', { path: PATH })
    expect(parsed.checks.map(c => c.command)).toEqual(['echo 1', 'echo 2'])
  })

  it('should report malformed lines and keep the rest of the file', () => {
    const text = 'just some words\nok: true\n: missing name\nempty: \n'
    const parsed = parseCheckfile(text, { path: PATH })

    expect(parsed.checks.map(c => c.name)).toEqual(['ok'])
    expect(parsed.diagnostics).toEqual([
      { path: PATH, line: 1, text: 'just some words', message: 'Expected "<name>: <command>"' },
      { path: PATH, line: 3, text: ': missing name', message: 'Check name is empty' },
      { path: PATH, line: 4, text: 'empty: ', message: 'Expected "<name>: <command>"' },
    ])
  })

  it('should let a later duplicate win within one file', () => {
    const parsed = parseCheckfile('a: echo old\nb: true\na: echo new\n', { path: PATH })
    expect(parsed.checks.map(c => [c.name, c.command])).toEqual([
      ['b', 'true'],
      ['a', 'echo new'],
    ])
    expect(parsed.diagnostics).toHaveLength(1)
    expect(parsed.diagnostics[0]?.message).toBe('Duplicate check "a" (line 1 is replaced)')
  })

  it('should be idempotent for the same text', () => {
    const text = '#- Group\na: echo 1\n# note\nb: echo 2\n'
    expect(parseCheckfile(text, { path: PATH })).toEqual(parseCheckfile(text, { path: PATH }))
  })
})
