import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {checkDefinitions} from '../../core/compiler.js'
import {DefinitionLoader} from '../../core/definition-loader.js'
import {getGlobalOptions} from '../utils.js'

export function registerInterfacesCommand(program: Command): void {
  program
    .command('interfaces')
    .description('Show the host interface assigned to each container')
    .argument('<files...>', 'Definition files (JSON or YAML)')
    .action(async (files: string[], _options: Record<string, unknown>, cmd: Command) => {
      const {cwd, json} = getGlobalOptions(cmd)
      const root = resolve(cwd)
      const definitions = await new DefinitionLoader().load(files.map(file => resolve(root, file)))
      const assignments = checkDefinitions(definitions.containers)

      const rows = [...assignments].map(([container, assignment]) => ({
        container,
        ifName: assignment?.ifName ?? '-',
        kind: assignment?.kind ?? 'none',
        zone: assignment?.zone ?? '-'
      }))

      if (json) {
        console.log(JSON.stringify(rows, null, 2))
        return
      }

      if (rows.length === 0) {
        console.log(chalk.gray('No containers defined.'))
        return
      }

      const containerWidth = Math.max('CONTAINER'.length, ...rows.map(r => r.container.length))
      const ifNameWidth = Math.max('INTERFACE'.length, ...rows.map(r => r.ifName.length))
      const kindWidth = Math.max('KIND'.length, ...rows.map(r => r.kind.length))

      console.log(chalk.bold(`${'CONTAINER'.padEnd(containerWidth)}  ${'INTERFACE'.padEnd(ifNameWidth)}  ${'KIND'.padEnd(kindWidth)}  ZONE`))
      for (const row of rows) {
        console.log(`${row.container.padEnd(containerWidth)}  ${row.ifName.padEnd(ifNameWidth)}  ${row.kind.padEnd(kindWidth)}  ${row.zone}`)
      }
    })
}
