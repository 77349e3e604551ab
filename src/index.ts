/**
 * Library entry point.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {Compiler, DefinitionLoader, InlineBridge, CommandEvaluator, renderArtifacts, writeArtifacts} from 'berth'
 *
 * const definitions = await new DefinitionLoader().load(['containers.yml'])
 * const bridge = new InlineBridge({
 *   evaluator: new CommandEvaluator({command: './evaluate-container'})
 * })
 *
 * const artifacts = await new Compiler({bridge}).compile(definitions)
 * await writeArtifacts('./result', renderArtifacts(artifacts))
 * ```
 */

export {
  Priority,
  priorityName,
  mergeLayers,
  type Layer,
  allocateInterface,
  hostNetworkName,
  maxInterfaceNameLength,
  hostBaseline,
  containerBaseline,
  resolveLinkConfigs,
  resolveHostLinkConfig,
  resolveContainerLinkConfig,
  resolveBinds,
  formatBind,
  normalizeBindPath,
  validateBinds,
  storeBind,
  generateUnit,
  generateHostWiring,
  firewallAllowances,
  launchUnitName,
  stateDirectory,
  Compiler,
  checkDefinitions,
  validateDefinitions,
  validateZone,
  type CompilerOptions,
  DefinitionLoader,
  parseDefinitionSet,
  renderArtifacts,
  toCanonicalJson,
  writeArtifacts,
  ConsoleReporter,
  noopReporter,
  type Reporter,
  type CompileEvent,
  formatDuration
} from './core/index.js'

export {
  ContainerEvaluator,
  CommandEvaluator,
  InlineBridge,
  injectedLayers,
  currentHostPlatform,
  type EvaluationRequest,
  type ModuleLayer,
  type CommandEvaluatorOptions,
  type InlineBridgeOptions
} from './engine/index.js'

export type * from './types.js'

export {
  BerthError,
  DefinitionError,
  ValidationError,
  DuplicateContainerNameError,
  NameTooLongError,
  ConflictingSourceSpecificationError,
  InvalidBindSpecError,
  MergeConflictError,
  EvaluationError,
  InlineEvaluationError,
  EvaluatorNotAvailableError
} from './errors.js'
