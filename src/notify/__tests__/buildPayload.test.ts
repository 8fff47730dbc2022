import { describe, it, expect } from 'vitest'
import { buildNotificationPayload, toWireReport } from '../buildPayload.js'
import type { ValidationReport } from '../../types/report.js'
import { SAMPLE_DEPLOYMENT, sampleTask } from '../../../tests/helpers/index.js'

const report: ValidationReport = {
  staticResult: { passed: true, errors: [], warnings: [], totalFiles: 3, filesValidated: [] },
  checksResult: { results: [], passedCount: 0, totalCount: 0 },
  liveResult: null,
  stageErrors: [],
  startedAt: '2024-01-01T00:00:00.000Z',
  finishedAt: '2024-01-01T00:00:01.000Z',
}

describe('buildNotificationPayload', () => {
  it('maps task and deployment to snake_case fields', () => {
    expect(buildNotificationPayload(sampleTask(), SAMPLE_DEPLOYMENT, report)).toEqual({
      email: 'student@example.com',
      task: 'sum-page-1',
      round: 1,
      nonce: 'nonce-1',
      repo_url: 'https://git.example.com/student/sum-page-1',
      commit_sha: 'abc123',
      pages_url: 'https://pages.example.com/sum-page-1/',
      validation: toWireReport(report),
    })
  })

  it('uses empty strings when nothing was published', () => {
    const payload = buildNotificationPayload(sampleTask(), null, report)
    expect(payload.repo_url).toBe('')
    expect(payload.commit_sha).toBe('')
    expect(payload.pages_url).toBe('')
  })

  it('uses an empty pages URL when pages are not enabled', () => {
    const payload = buildNotificationPayload(sampleTask(), { ...SAMPLE_DEPLOYMENT, pagesUrl: null }, report)
    expect(payload.pages_url).toBe('')
    expect(payload.repo_url).toBe(SAMPLE_DEPLOYMENT.repoUrl)
  })
})

describe('toWireReport', () => {
  it('renames every report field to snake_case', () => {
    const live: ValidationReport = {
      ...report,
      checksResult: {
        results: [
          {
            spec: { rawText: 'Repo has MIT license' },
            category: 'mit_license',
            passed: true,
            detail: 'MIT License found',
            confidence: 'high',
          },
        ],
        passedCount: 1,
        totalCount: 1,
      },
      liveResult: {
        passed: true,
        url: 'https://pages.example.com/sum-page-1/',
        pageInfo: { statusCode: 200, responseTimeMs: 42, htmlSizeBytes: 512, title: 'Sum' },
        errors: [],
        warnings: ['Page HTML is very short (512 bytes)'],
        checks: [],
      },
      stageErrors: ['publish stage fault: push rejected'],
    }

    expect(toWireReport(live)).toEqual({
      static_result: { passed: true, errors: [], warnings: [], total_files: 3, files_validated: [] },
      checks_result: {
        results: [
          {
            check: 'Repo has MIT license',
            category: 'mit_license',
            passed: true,
            detail: 'MIT License found',
            confidence: 'high',
          },
        ],
        passed_count: 1,
        total_count: 1,
      },
      live_result: {
        passed: true,
        url: 'https://pages.example.com/sum-page-1/',
        page_info: {
          status_code: 200,
          response_time_ms: 42,
          html_size_bytes: 512,
          title: 'Sum',
          scripts_count: null,
          links_count: null,
        },
        errors: [],
        warnings: ['Page HTML is very short (512 bytes)'],
        checks: [],
      },
      stage_errors: ['publish stage fault: push rejected'],
      started_at: '2024-01-01T00:00:00.000Z',
      finished_at: '2024-01-01T00:00:01.000Z',
    })
  })

  it('keeps a missing live result as null', () => {
    expect(toWireReport(report).live_result).toBeNull()
  })
})
