/**
 * checkpulse start
 * 持续运行：加载 checks、按间隔执行、监听 checkfile 变化，状态变化时重绘表格
 */

import type { Command } from 'commander'
import chalk from 'chalk'
import { flushLogs } from '../../shared/logger.js'
import { printError } from '../../shared/error.js'
import type { Orchestrator } from '../../orchestrator/index.js'
import { renderStatusTable, summarizeCounts, warn } from '../output.js'
import { createCheckOrchestrator, parsePositiveInt, resolveSettings } from '../settings.js'

interface StartOptions {
  dir?: string
  interval?: number
  json?: boolean
}

const RENDER_DELAY_MS = 100

function attachTableView(orchestrator: Orchestrator): void {
  let renderTimer: ReturnType<typeof setTimeout> | null = null

  const render = () => {
    renderTimer = null
    const { checksDir, scheduler } = orchestrator.status()
    const states = orchestrator.snapshot()
    console.clear()
    console.log(chalk.cyan(`checkpulse · ${checksDir} · 每 ${scheduler.runIntervalSeconds}s (Ctrl+C 退出)\n`))
    console.log(renderStatusTable(states))
    console.log(summarizeCounts(states))
    console.log(chalk.gray(`\n更新时间: ${new Date().toLocaleTimeString()}`))
  }

  // 一批结果同时到达时只重绘一次
  const scheduleRender = () => {
    if (!renderTimer) renderTimer = setTimeout(render, RENDER_DELAY_MS)
  }

  orchestrator.events.on('check:updated', scheduleRender)
  orchestrator.events.on('checks:reloaded', scheduleRender)
}

function attachJsonView(orchestrator: Orchestrator): void {
  orchestrator.events.on('check:updated', state => {
    console.log(JSON.stringify({ event: 'check:updated', check: state }))
  })
  orchestrator.events.on('checks:reloaded', summary => {
    console.log(JSON.stringify({ event: 'checks:reloaded', summary }))
  })
}

export function registerStartCommand(program: Command): void {
  program
    .command('start')
    .description('持续运行所有 check，checkfile 变化时自动重新加载')
    .option('-d, --dir <path>', 'checkfile 目录（默认: ~/Checkpulse）')
    .option('-i, --interval <seconds>', '执行间隔（秒）', parsePositiveInt)
    .option('--json', '每次状态变化输出一行 JSON')
    .action(async (options: StartOptions) => {
      const settings = await resolveSettings(options)
      const orchestrator = createCheckOrchestrator(settings, { watch: true })

      if (options.json) attachJsonView(orchestrator)
      else attachTableView(orchestrator)

      orchestrator.events.on('watcher:failed', failure => {
        warn(`${failure.message}，checkfile 的修改需要重启后生效`)
      })

      try {
        await orchestrator.start()
      } catch (error) {
        printError(error)
        process.exitCode = 1
        return
      }

      const shutdown = async () => {
        try {
          await orchestrator.stop()
        } catch (error) {
          printError(error)
          process.exitCode = 1
        }
        flushLogs()
        process.exit()
      }
      process.once('SIGINT', () => void shutdown())
      process.once('SIGTERM', () => void shutdown())
    })
}
