import type { Command } from 'commander'
import chalk from 'chalk'
import { classifyCheck, extractElementId, extractRequestedVersion } from '../../checks/index.js'

export function registerClassifyCommand(program: Command) {
  program
    .command('classify')
    .description('Show which rule a check text is routed to')
    .argument('<text>', 'check text')
    .action((text: string) => {
      const category = classifyCheck(text)
      console.log(chalk.bold(category))

      // 附带提取到的参数，方便排查误分类
      if (category === 'html_element_by_id') {
        console.log(chalk.gray(`  id: ${extractElementId(text) ?? '-'}`))
      }
      if (category === 'cdn_script_presence') {
        console.log(chalk.gray(`  version: ${extractRequestedVersion(text) ?? 'any'}`))
      }
    })
}
