import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {Compiler} from '../../core/compiler.js'
import {DefinitionLoader} from '../../core/definition-loader.js'
import {renderArtifacts, toCanonicalJson, writeArtifacts} from '../../core/render.js'
import {ConsoleReporter, type Reporter} from '../../core/reporter.js'
import {CommandEvaluator} from '../../engine/command-evaluator.js'
import {InlineBridge} from '../../engine/inline-bridge.js'
import {applyEnvironment, loadConfig} from '../config.js'
import {InteractiveReporter} from '../reporter.js'
import {getGlobalOptions} from '../utils.js'

export function registerCompileCommand(program: Command): void {
  program
    .command('compile')
    .description('Compile container definitions into host artifacts')
    .argument('<files...>', 'Definition files (JSON or YAML)')
    .option('-o, --out <dir>', 'Directory receiving the rendered files', 'result')
    .option('--stdout', 'Print the artifact set as canonical JSON instead of writing files')
    .action(async (files: string[], options: {out: string; stdout?: boolean}, cmd: Command) => {
      const {cwd, json} = getGlobalOptions(cmd)
      const root = resolve(cwd)
      const config = applyEnvironment(await loadConfig(root))
      const definitions = await new DefinitionLoader().load(files.map(file => resolve(root, file)))

      const bridge = config.evaluator
        ? new InlineBridge({
          evaluator: new CommandEvaluator({...config.evaluator, cwd: root}),
          hostPlatform: config.hostPlatform
        })
        : undefined
      // Keep stdout clean for the JSON document
      const reporter: Reporter = json || options.stdout
        ? new ConsoleReporter({destination: process.stderr})
        : new InteractiveReporter()

      const compiler = new Compiler({bridge, reporter, imports: config.imports})
      const artifacts = await compiler.compile(definitions)

      if (options.stdout) {
        process.stdout.write(toCanonicalJson(artifacts))
        return
      }

      const outDir = resolve(root, options.out)
      const written = await writeArtifacts(outDir, renderArtifacts(artifacts))
      if (!json) {
        console.log(chalk.gray(`Wrote ${written.length} file${written.length === 1 ? '' : 's'} to ${outDir}`))
      }
    })
}
