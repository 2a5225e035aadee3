#!/usr/bin/env node
/**
 * @entry checkpulse CLI 主入口
 *
 *   checkpulse start            - 持续运行并显示状态表
 *   checkpulse list             - 查看 checkfile 与 check
 *   checkpulse run [names...]   - 执行一次并输出结果
 */

import { Command } from 'commander'
import { setLogLevel } from '../shared/logger.js'
import { registerStartCommand } from './commands/start.js'
import { registerListCommand } from './commands/list.js'
import { registerRunCommand } from './commands/run.js'

const program = new Command()

program
  .name('checkpulse')
  .description('周期运行 check 命令并汇总状态')
  .version('0.1.0')
  .option('-v, --verbose', '显示详细日志 (debug 级别)')
  .hook('preAction', command => {
    if (command.opts<{ verbose?: boolean }>().verbose) setLogLevel('debug')
  })

registerStartCommand(program)
registerListCommand(program)
registerRunCommand(program)

await program.parseAsync()
