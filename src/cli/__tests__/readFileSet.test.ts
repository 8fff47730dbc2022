import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdirSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { readFileSet } from '../readFileSet.js'
import { reportPassed } from '../commands/validate.js'
import type { ValidationReport } from '../../types/report.js'

const TEST_DIR = join(tmpdir(), `avf-cli-test-${Date.now()}`)

beforeAll(() => {
  mkdirSync(join(TEST_DIR, 'js'), { recursive: true })
  writeFileSync(join(TEST_DIR, 'index.html'), '<!DOCTYPE html>')
  writeFileSync(join(TEST_DIR, 'js', 'app.js'), 'run()')
})

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('readFileSet', () => {
  it('reads nested files under posix relative names', async () => {
    const result = await readFileSet(TEST_DIR)
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value).toEqual({ 'index.html': '<!DOCTYPE html>', 'js/app.js': 'run()' })
    }
  })

  it('returns an evidence error for a missing directory', async () => {
    const result = await readFileSet(join(TEST_DIR, 'nope'))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('ERR_EVIDENCE')
      expect(result.error.message).toBe(`Evidence extraction failed: cannot read ${join(TEST_DIR, 'nope')}`)
    }
  })
})

describe('reportPassed', () => {
  const base: ValidationReport = {
    staticResult: { passed: true, errors: [], warnings: [], totalFiles: 3, filesValidated: [] },
    checksResult: { results: [], passedCount: 2, totalCount: 2 },
    liveResult: null,
    stageErrors: [],
    startedAt: '2024-01-01T00:00:00.000Z',
    finishedAt: '2024-01-01T00:00:01.000Z',
  }

  it('passes when static and every check pass', () => {
    expect(reportPassed(base)).toBe(true)
  })

  it('fails when any check fails', () => {
    expect(reportPassed({ ...base, checksResult: { results: [], passedCount: 1, totalCount: 2 } })).toBe(false)
  })

  it('fails when the live page fails', () => {
    const liveResult = {
      passed: false,
      url: 'https://pages.example.com/',
      pageInfo: { statusCode: 500, responseTimeMs: 3, htmlSizeBytes: 0 },
      errors: ['Page returned HTTP 500'],
      warnings: [],
      checks: [],
    }
    expect(reportPassed({ ...base, liveResult })).toBe(false)
  })
})
