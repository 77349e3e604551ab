import {execa, ExecaError} from 'execa'
import {EvaluationError, EvaluatorNotAvailableError} from '../errors.js'
import {ContainerEvaluator, type EvaluationRequest} from './evaluator.js'

export type CommandEvaluatorOptions = {
  command: string;
  args?: string[];
  cwd?: string;
}

/**
 * Runs an external command per container. The request is written as JSON
 * on stdin and the last non-empty stdout line is the resolved path.
 */
export class CommandEvaluator extends ContainerEvaluator {
  private readonly command: string
  private readonly args: string[]
  private readonly cwd?: string

  constructor(options: CommandEvaluatorOptions) {
    super()
    this.command = options.command
    this.args = options.args ?? []
    this.cwd = options.cwd
  }

  async evaluate(request: EvaluationRequest): Promise<string> {
    let stdout: string
    try {
      const result = await execa(this.command, this.args, {
        cwd: this.cwd,
        input: JSON.stringify(request)
      })
      stdout = result.stdout
    } catch (error) {
      if (!(error instanceof ExecaError)) {
        throw error
      }

      if (error.code === 'ENOENT') {
        throw new EvaluatorNotAvailableError(this.command, {cause: error})
      }

      const errorStderr: unknown = error.stderr
      const stderr = typeof errorStderr === 'string' ? errorStderr.trim() : ''
      const outcome = error.signal ? `was terminated by ${error.signal}` : `exited with code ${String(error.exitCode)}`
      throw new EvaluationError(
        'EVALUATOR_FAILED',
        `Evaluator ${outcome}${stderr ? `: ${stderr}` : ''}`,
        {cause: error}
      )
    }

    const lines = stdout.split('\n').map(line => line.trim()).filter(Boolean)
    const path = lines.at(-1)
    if (!path?.startsWith('/')) {
      throw new EvaluationError('EVALUATOR_INVALID_OUTPUT', `Evaluator did not print an absolute path (got "${path ?? ''}")`)
    }

    return path
  }
}
