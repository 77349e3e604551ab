import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {BerthError} from '../../errors.js'
import {checkDefinitions} from '../../core/compiler.js'
import {DefinitionLoader} from '../../core/definition-loader.js'
import {getGlobalOptions} from '../utils.js'

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Validate definitions without evaluating them')
    .argument('<files...>', 'Definition files (JSON or YAML)')
    .action(async (files: string[], _options: Record<string, unknown>, cmd: Command) => {
      const {cwd, json} = getGlobalOptions(cmd)
      const root = resolve(cwd)

      try {
        const definitions = await new DefinitionLoader().load(files.map(file => resolve(root, file)))
        const assignments = checkDefinitions(definitions.containers)
        if (json) {
          console.log(JSON.stringify({valid: true, containers: [...assignments.keys()]}))
        } else {
          console.log(chalk.green(`✓ ${assignments.size} container${assignments.size === 1 ? '' : 's'} valid`))
        }
      } catch (error: unknown) {
        if (!(error instanceof BerthError)) {
          throw error
        }

        if (json) {
          console.log(JSON.stringify({valid: false, code: error.code, message: error.message}))
        } else {
          console.error(chalk.red(`✗ ${error.message}`))
        }

        process.exitCode = 1
      }
    })
}
