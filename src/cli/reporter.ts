import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {CompileEvent, CompileFinishedEvent, Reporter} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local use; inline evaluations can take a while.
 */
export class InteractiveReporter implements Reporter {
  private readonly spinners = new Map<string, Ora>()

  emit(event: CompileEvent): void {
    switch (event.event) {
      case 'COMPILE_START': {
        const inline = event.inlineCount > 0 ? chalk.gray(` (${event.inlineCount} to evaluate)`) : ''
        console.log(chalk.bold(`\n▶ Compiling ${chalk.cyan(String(event.containerCount))} container${event.containerCount === 1 ? '' : 's'}${inline}\n`))
        break
      }

      case 'CONTAINER_EVALUATING': {
        const spinner = ora({text: `${event.container} (evaluating)`, prefixText: ' '}).start()
        this.spinners.set(event.container, spinner)
        break
      }

      case 'CONTAINER_EVALUATED': {
        const spinner = this.spinners.get(event.container)
        if (spinner) {
          spinner.stopAndPersist({symbol: chalk.green('✓'), text: `${event.container} ${chalk.gray(formatDuration(event.durationMs))}`})
          this.spinners.delete(event.container)
        }

        break
      }

      case 'CONTAINER_RESOLVED': {
        const link = event.ifName ? chalk.cyan(event.ifName) : chalk.gray('no network')
        console.log(`  ${chalk.green('●')} ${event.container}  ${link}  ${chalk.gray(event.path)}`)
        break
      }

      case 'COMPILE_FINISHED': {
        this.handleFinished(event)
        break
      }

      case 'COMPILE_FAILED': {
        for (const spinner of this.spinners.values()) {
          spinner.stopAndPersist({symbol: chalk.red('✗')})
        }

        this.spinners.clear()
        console.log(chalk.bold.red(`\n✗ Compilation failed: ${event.message}\n`))
        break
      }
    }
  }

  private handleFinished(event: CompileFinishedEvent): void {
    console.log(chalk.bold.green(`\n✓ Compiled ${event.containerCount} container${event.containerCount === 1 ? '' : 's'} (${formatDuration(event.durationMs)})\n`))
  }
}
