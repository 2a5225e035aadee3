/**
 * checkpulse run
 * 不启动定时器，把匹配的 check 各执行一次后输出结果；有失败或错误时退出码 1
 */

import type { Command } from 'commander'
import { printError } from '../../shared/error.js'
import { isFailureStatus } from '../../types/checkState.js'
import { formatDebugView, renderStatusTable, summarizeCounts } from '../output.js'
import { createCheckOrchestrator, resolveSettings } from '../settings.js'
import { withSpinner } from '../spinner.js'

interface RunOptions {
  dir?: string
  debug?: boolean
  json?: boolean
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('执行一次指定的 check（不指定则全部）')
    .argument('[names...]', 'check 名称')
    .option('-d, --dir <path>', 'checkfile 目录（默认: ~/Checkpulse）')
    .option('--debug', '显示每个 check 的命令、目录、退出码、stdout 和 stderr')
    .option('--json', '输出 JSON')
    .action(async (names: string[], options: RunOptions) => {
      try {
        const settings = await resolveSettings(options)
        const orchestrator = createCheckOrchestrator(settings, { watch: false })
        const total = names.length > 0 ? new Set(names).size : null
        const states = await withSpinner(
          '正在执行 check...',
          spinner => {
            let done = 0
            orchestrator.events.on('check:updated', state => {
              done++
              spinner.update(`${state.name} 完成 (${done}${total !== null ? `/${total}` : ''})`)
            })
            return orchestrator.runOnce(names)
          },
          { enabled: !options.json && process.stderr.isTTY }
        )

        if (options.json) {
          console.log(JSON.stringify(states, null, 2))
        } else if (options.debug) {
          console.log(states.map(formatDebugView).join('\n\n'))
          console.log()
          console.log(summarizeCounts(states))
        } else {
          console.log(renderStatusTable(states))
          console.log(summarizeCounts(states))
        }

        if (states.some(state => isFailureStatus(state.status))) process.exitCode = 1
      } catch (error) {
        printError(error)
        process.exitCode = 1
      }
    })
}
