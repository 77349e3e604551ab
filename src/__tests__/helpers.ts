import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {CompileEvent, Reporter} from '../core/reporter.js'
import {ContainerEvaluator, type EvaluationRequest} from '../engine/evaluator.js'
import type {ContainerDefinition} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'berth-test-'))
}

/**
 * Point-to-point container backed by a prebuilt path, with no binds.
 */
export function makeDefinition(name: string, overrides: Partial<ContainerDefinition> = {}): ContainerDefinition {
  return {
    name,
    autoStart: true,
    restartIfChanged: true,
    network: {mode: 'point-to-point'},
    linkOverrides: {},
    binds: [],
    source: {path: `/nix/store/${name}-system`},
    ...overrides
  }
}

/**
 * Evaluator answering `/nix/store/<container>-inline` and recording requests.
 * Containers listed in `failing` reject.
 */
export class StubEvaluator extends ContainerEvaluator {
  readonly requests: EvaluationRequest[] = []

  constructor(private readonly failing: string[] = []) {
    super()
  }

  async evaluate(request: EvaluationRequest): Promise<string> {
    this.requests.push(request)
    if (this.failing.includes(request.container)) {
      throw new Error(`conflicting definitions for ${request.container}`)
    }

    return `/nix/store/${request.container}-inline`
  }
}

/**
 * Returns a reporter that records emitted events for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: CompileEvent[]} {
  const events: CompileEvent[] = []
  const reporter: Reporter = {
    emit(event: CompileEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}
