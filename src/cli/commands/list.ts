/**
 * checkpulse list
 * 显示发现的 checkfile、分组、check、解析诊断和同名覆盖
 */

import type { Command } from 'commander'
import chalk from 'chalk'
import { printError } from '../../shared/error.js'
import { loadCheckfiles, type ParsedCheckfile } from '../../checkfile/index.js'
import { mergeDefinitions } from '../../registry/index.js'
import { bulletList, header, info, warn } from '../output.js'
import { resolveSettings } from '../settings.js'

interface ListOptions {
  dir?: string
}

function printCheckfile(file: ParsedCheckfile): void {
  header(file.path === file.realPath ? file.path : `${file.path} → ${file.realPath}`)

  let section: string | null | undefined
  for (const def of file.checks) {
    if (def.section !== section) {
      section = def.section
      if (section !== null) console.log(chalk.magenta(`  ${section}`))
    }
    console.log(`  ${chalk.bold(def.name)}${chalk.gray(':')} ${def.command}`)
  }
  if (file.checks.length === 0) console.log(chalk.dim('  (没有 check)'))

  for (const diagnostic of file.diagnostics) {
    console.log(chalk.yellow(`  line ${diagnostic.line}: ${diagnostic.message}`) + chalk.dim(`  ${diagnostic.text}`))
  }
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('列出 checkfile 和其中的 check')
    .option('-d, --dir <path>', 'checkfile 目录（默认: ~/Checkpulse）')
    .action(async (options: ListOptions) => {
      try {
        const { checksDir } = await resolveSettings(options)
        const { files, failures } = await loadCheckfiles(checksDir)
        const { definitions, collisions } = mergeDefinitions(files)

        files.forEach(printCheckfile)

        if (failures.length > 0) {
          console.log()
          warn(`${failures.length} 个 checkfile 无法读取:`)
          bulletList(failures.map(f => f.message))
        }
        if (collisions.length > 0) {
          console.log()
          warn('同名 check（后面的文件覆盖前面的）:')
          bulletList(collisions.map(c => `${c.name}: ${c.keptPath} 覆盖 ${c.droppedPath}`))
        }

        console.log()
        info(`${checksDir}: ${files.length} 个 checkfile, ${definitions.size} 个 check`)
      } catch (error) {
        printError(error)
        process.exitCode = 1
      }
    })
}
