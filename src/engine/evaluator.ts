import type {ModuleConfig, Overlay} from '../types.js'

/** Priority-tagged module fragment injected ahead of the operator's modules. */
export type ModuleLayer = {
  /** "force" | "default" | "override" | "baseline". */
  priority: string;
  values: ModuleConfig;
}

/**
 * Everything the external evaluator needs to build one container's system.
 * Serialized as JSON by command-based evaluators.
 */
export type EvaluationRequest = {
  container: string;
  /** Option path of the container, used in evaluator error messages. */
  prefix: string[];
  /** Injected settings, each layer carrying its own priority. */
  layers: ModuleLayer[];
  /** Shared overlays followed by the container's own inline config. */
  imports: Overlay[];
}

/**
 * Abstract interface for evaluating inline container configurations.
 *
 * Implementations:
 * - `CommandEvaluator`: pipes the request to an external command
 * - Tests: in-process stubs returning fixed paths
 */
export abstract class ContainerEvaluator {
  /**
   * Evaluates one container configuration.
   * @returns Absolute resolved system path
   * @throws When the evaluation fails; the whole pass is aborted
   */
  abstract evaluate(request: EvaluationRequest): Promise<string>
}
