import type { Command } from 'commander'
import { loadConfig } from '../../config/index.js'
import { createHttpClient } from '../../http/httpClient.js'
import { validateLive, formatLiveSection } from '../../validation/index.js'
import { toCheckSpecs } from '../../types/check.js'
import { printLines } from '../output.js'

interface LiveOptions {
  check?: string[]
  json?: boolean
}

export function registerLiveCommand(program: Command) {
  program
    .command('live')
    .description('Validate a published page only')
    .argument('<url>', 'page URL')
    .option('-c, --check <text...>', 'free-text check to evaluate (repeatable)')
    .option('--json', 'print the result as JSON')
    .action(async (url: string, options: LiveOptions) => {
      const config = await loadConfig()
      const result = await validateLive(url, toCheckSpecs(options.check ?? []), {
        http: createHttpClient(),
        timeoutMs: config.validation.pageTimeoutMs,
        minPageBytes: config.validation.minPageBytes,
      })

      if (options.json) {
        console.log(JSON.stringify(result, null, 2))
      } else {
        printLines(formatLiveSection(result))
      }
      if (!result.passed) process.exitCode = 1
    })
}
