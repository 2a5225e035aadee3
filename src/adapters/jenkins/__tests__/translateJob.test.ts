import { describe, it, expect } from 'vitest'
import { translateJob, findRevision } from '../translateJob.js'
import { jobSchema, type JenkinsBuild, type JenkinsJob } from '../schema.js'
import { formatTimestamp } from '../../../shared/formatTime.js'

const STARTED_42 = 1709280000000
const STARTED_43 = 1709283600000

const build42: JenkinsBuild = {
  id: '42',
  result: 'SUCCESS',
  building: false,
  fullDisplayName: 'api #42',
  url: 'https://ci.example.test/job/api/42/',
  timestamp: STARTED_42,
  duration: 3723000,
  changeSet: { items: [] },
  actions: [{ lastBuiltRevision: { SHA1: '9876543210fedcba' } }],
}

const build43: JenkinsBuild = {
  id: '43',
  result: 'FAILURE',
  building: false,
  fullDisplayName: 'api #43',
  url: 'https://ci.example.test/job/api/43/',
  timestamp: STARTED_43,
  duration: 125000,
  changeSet: {
    items: [
      { msg: 'first change', commitId: '1111111aaaaaaa', author: { fullName: 'Ann Example' } },
      { msg: 'second change', author: { fullName: 'Bo Example' } },
    ],
  },
  actions: [{}, null, { lastBuiltRevision: { SHA1: 'abcdef0123456789' } }],
}

function job(overrides: Partial<JenkinsJob>): JenkinsJob {
  return { name: 'api', color: 'blue', lastBuild: build42, lastSuccessfulBuild: build42, ...overrides }
}

describe('translateJob', () => {
  it('should omit the last successful block when the last build succeeded', () => {
    const contract = translateJob(job({}))

    expect(contract).toEqual({
      result: true,
      changing: false,
      url: 'https://ci.example.test/job/api/42/console',
      info: [
        ['Build', 'api #42'],
        ['Duration', '01:02:03'],
        ['Started', formatTimestamp(STARTED_42)],
        ['SHA', '987654'],
      ],
    })
  })

  it('should describe a failing build with recents and the last successful build', () => {
    const contract = translateJob(job({ color: 'red', lastBuild: build43 }))

    expect(contract.result).toBe(false)
    expect(contract.url).toBe('https://ci.example.test/job/api/43/console')
    expect(contract.info).toEqual([
      ['Build', 'api #43'],
      ['Duration', '00:02:05'],
      ['Started', formatTimestamp(STARTED_43)],
      ['SHA', 'abcdef'],
      ['Author', 'Bo Example'],
      ['-', ''],
      ['Recents', ''],
      [' - second change', '<missing>'],
      [' - first change', '111111'],
      ['-', ''],
      ['Last Successful Build', ''],
      ['  Name', 'api #42'],
      ['  Duration', '01:02:03'],
      ['  SHA', '987654'],
      ['  Started', formatTimestamp(STARTED_42)],
    ])
  })

  it('should treat blue_anime as passing and report the running build', () => {
    const contract = translateJob(job({ color: 'blue_anime', lastBuild: { ...build42, building: true } }))

    expect(contract.result).toBe(true)
    expect(contract.changing).toBe(true)
  })

  it.each(['red', 'yellow', 'disabled', 'notbuilt', 'aborted', 'red_anime'])('should treat %s as not passing', color => {
    expect(translateJob(job({ color })).result).toBe(false)
  })

  it('should leave out SHA when no action carries a revision', () => {
    const contract = translateJob(job({ lastBuild: { ...build42, actions: [{}] }, lastSuccessfulBuild: null }))

    expect(contract.info.map(([label]) => label)).toEqual(['Build', 'Duration', 'Started'])
  })

  it('should handle a job that has never been built', () => {
    const contract = translateJob(job({ color: 'notbuilt_anime', lastBuild: null, lastSuccessfulBuild: null }))

    expect(contract).toEqual({ result: false, changing: true, url: null, info: [['Build', 'none']] })
  })

  it('should accept upstream JSON with extra fields', () => {
    const parsed = jobSchema.parse({
      _class: 'hudson.model.FreeStyleProject',
      name: 'api',
      color: 'blue',
      lastBuild: {
        _class: 'hudson.model.FreeStyleBuild',
        id: '7',
        building: false,
        fullDisplayName: 'api #7',
        url: 'https://ci.example.test/job/api/7/',
        timestamp: STARTED_42,
        duration: 1000,
        actions: [{ _class: 'hudson.model.CauseAction' }],
      },
    })

    expect(translateJob(parsed).info).toEqual([
      ['Build', 'api #7'],
      ['Duration', '00:00:01'],
      ['Started', formatTimestamp(STARTED_42)],
    ])
  })
})

describe('findRevision', () => {
  it('should return the first action holding a revision', () => {
    expect(findRevision(build43)).toBe('abcdef0123456789')
    expect(findRevision({ ...build43, actions: [] })).toBeNull()
  })
})
