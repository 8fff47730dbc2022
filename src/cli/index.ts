#!/usr/bin/env node
/**
 * @entry artifact-verifier CLI 主入口
 *
 *   avf validate <dir> -c "..."    - 校验本地生成目录
 *   avf live <url> -c "..."        - 只校验线上页面
 *   avf classify "..."             - 查看检查文本的分类
 */

import { Command } from 'commander'
import { setLogLevel } from '../shared/logger.js'
import { printError } from '../shared/error.js'
import { registerValidateCommand } from './commands/validate.js'
import { registerClassifyCommand } from './commands/classify.js'
import { registerLiveCommand } from './commands/live.js'

const program = new Command()

program
  .name('avf')
  .description('Validate generated web artifacts against free-text checks')
  .version('1.0.0')
  .option('-v, --verbose', 'debug logging')
  .hook('preAction', thisCommand => {
    // 报告由命令自己打印，默认只保留警告以上的诊断日志
    setLogLevel(thisCommand.opts().verbose ? 'debug' : 'warn')
  })

registerValidateCommand(program)
registerLiveCommand(program)
registerClassifyCommand(program)

program.parseAsync(process.argv).catch((error: unknown) => {
  printError(error)
  process.exitCode = 1
})
