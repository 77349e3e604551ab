import pino, {type DestinationStream, type Logger} from 'pino'

/**
 * Discriminated union of compilation events.
 *
 * Lifecycle:
 * 1. COMPILE_START - Definitions validated, interfaces allocated
 * 2. For each inline container:
 *    a. CONTAINER_EVALUATING - Evaluation handed to the evaluator
 *    b. CONTAINER_EVALUATED - Resolved path returned
 * 3. CONTAINER_RESOLVED - Once per container, in name order
 * 4. COMPILE_FINISHED - Artifact set produced
 *    OR COMPILE_FAILED - Pass aborted, nothing emitted
 */
export type CompileStartEvent = {
  event: 'COMPILE_START';
  containerCount: number;
  inlineCount: number;
}

export type ContainerEvaluatingEvent = {
  event: 'CONTAINER_EVALUATING';
  container: string;
}

export type ContainerEvaluatedEvent = {
  event: 'CONTAINER_EVALUATED';
  container: string;
  path: string;
  durationMs: number;
}

export type ContainerResolvedEvent = {
  event: 'CONTAINER_RESOLVED';
  container: string;
  path: string;
  ifName?: string;
}

export type CompileFinishedEvent = {
  event: 'COMPILE_FINISHED';
  containerCount: number;
  durationMs: number;
}

export type CompileFailedEvent = {
  event: 'COMPILE_FAILED';
  code?: string;
  message: string;
}

export type CompileEvent =
  | CompileStartEvent
  | ContainerEvaluatingEvent
  | ContainerEvaluatedEvent
  | ContainerResolvedEvent
  | CompileFinishedEvent
  | CompileFailedEvent

/**
 * Interface for reporting compilation progress.
 */
export type Reporter = {
  emit(event: CompileEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: Logger

  constructor(options?: {level?: string; destination?: DestinationStream}) {
    const settings = {level: options?.level ?? 'info'}
    this.logger = options?.destination ? pino(settings, options.destination) : pino(settings)
  }

  emit(event: CompileEvent): void {
    if (event.event === 'COMPILE_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }
}

/** Silent reporter. */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}
