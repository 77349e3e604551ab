#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import {Command} from 'commander'
import {registerCheckCommand} from './commands/check.js'
import {registerCompileCommand} from './commands/compile.js'
import {registerInterfacesCommand} from './commands/interfaces.js'

async function main() {
  const program = new Command()

  program
    .name('berth')
    .description('Compile container definitions into systemd-nspawn host artifacts')
    .version('0.1.0')
    .option('--cwd <path>', 'Project directory (holds .berth.yml)', process.env.BERTH_CWD ?? '.')
    .option('--json', 'Output structured JSON logs')

  registerCompileCommand(program)
  registerCheckCommand(program)
  registerInterfacesCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error instanceof Error ? error.message : error)
  process.exitCode = 1
}
