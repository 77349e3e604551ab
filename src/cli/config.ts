import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import process from 'node:process'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import {isRecord, parseOverlays} from '../core/definition-loader.js'
import type {BerthConfig} from '../types.js'

export const configFileName = '.berth.yml'

/**
 * Loads the project-level `.berth.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<BerthConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFileName), 'utf8')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  return parseConfig(parseYaml(content))
}

export function parseConfig(parsed: unknown): BerthConfig {
  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (!isRecord(parsed)) {
    throw new ValidationError(`${configFileName}: must be a mapping`)
  }

  const config: BerthConfig = {}
  if (parsed.imports !== undefined) {
    config.imports = parseOverlays(parsed.imports, `${configFileName}: imports`)
  }

  if (parsed.hostPlatform !== undefined) {
    if (typeof parsed.hostPlatform !== 'string') {
      throw new ValidationError(`${configFileName}: hostPlatform must be a string`)
    }

    config.hostPlatform = parsed.hostPlatform
  }

  if (parsed.evaluator !== undefined) {
    const {evaluator} = parsed
    if (!isRecord(evaluator) || typeof evaluator.command !== 'string') {
      throw new ValidationError(`${configFileName}: evaluator.command must be a string`)
    }

    const args = evaluator.args ?? []
    if (!Array.isArray(args) || !args.every(arg => typeof arg === 'string')) {
      throw new ValidationError(`${configFileName}: evaluator.args must be a list of strings`)
    }

    config.evaluator = {command: evaluator.command, args: args.map(String)}
  }

  return config
}

/**
 * Applies `BERTH_EVALUATOR` (a whitespace-separated command line) and
 * `BERTH_HOST_PLATFORM` on top of the file configuration.
 */
export function applyEnvironment(config: BerthConfig, env: NodeJS.ProcessEnv = process.env): BerthConfig {
  const result: BerthConfig = {...config}
  const evaluator = env.BERTH_EVALUATOR?.trim()
  if (evaluator) {
    const [command, ...args] = evaluator.split(/\s+/)
    result.evaluator = {command, args}
  }

  if (env.BERTH_HOST_PLATFORM) {
    result.hostPlatform = env.BERTH_HOST_PLATFORM
  }

  return result
}
