import type { Command } from 'commander'
import { loadConfig } from '../../config/index.js'
import { createHttpClient } from '../../http/httpClient.js'
import { runValidation, formatValidationLog } from '../../validation/index.js'
import type { ValidationReport } from '../../types/report.js'
import { readFileSet } from '../readFileSet.js'
import { error, printLines } from '../output.js'

interface ValidateOptions {
  check?: string[]
  url?: string
  json?: boolean
}

export function reportPassed(report: ValidationReport): boolean {
  const { staticResult, checksResult, liveResult } = report
  return (
    staticResult.passed &&
    checksResult.passedCount === checksResult.totalCount &&
    (liveResult === null || liveResult.passed)
  )
}

export function registerValidateCommand(program: Command) {
  program
    .command('validate')
    .description('Validate a directory of generated files')
    .argument('<dir>', 'directory holding the generated artifact')
    .option('-c, --check <text...>', 'free-text check to evaluate (repeatable)')
    .option('--url <pagesUrl>', 'also validate the published page')
    .option('--json', 'print the report as JSON')
    .action(async (dir: string, options: ValidateOptions) => {
      const files = await readFileSet(dir)
      if (!files.ok) {
        error(files.error.message)
        process.exitCode = 1
        return
      }

      const config = await loadConfig()
      const report = await runValidation(
        { files: files.value, checks: options.check ?? [], pagesUrl: options.url ?? null },
        {
          http: createHttpClient(),
          pageTimeoutMs: config.validation.pageTimeoutMs,
          minPageBytes: config.validation.minPageBytes,
        }
      )

      if (options.json) {
        console.log(JSON.stringify(report, null, 2))
      } else {
        printLines(formatValidationLog(report))
      }
      if (!reportPassed(report)) process.exitCode = 1
    })
}
