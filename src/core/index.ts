export {Priority, priorityName, mergeLayers} from './priority.js'
export type {Layer} from './priority.js'
export {allocateInterface, hostNetworkName, maxInterfaceNameLength} from './interface-allocator.js'
export {hostBaseline, containerBaseline, resolveLinkConfigs, resolveHostLinkConfig, resolveContainerLinkConfig} from './network-config.js'
export {resolveBinds, formatBind, normalizeBindPath, validateBinds, storeBind} from './bind-mounts.js'
export {generateUnit} from './unit-generator.js'
export {generateHostWiring, firewallAllowances, launchUnitName, stateDirectory} from './host-wiring.js'
export {Compiler, checkDefinitions, validateDefinitions, validateZone, type CompilerOptions} from './compiler.js'
export {DefinitionLoader, parseDefinitionSet} from './definition-loader.js'
export {renderArtifacts, toCanonicalJson, writeArtifacts} from './render.js'
export {ConsoleReporter, noopReporter} from './reporter.js'
export type {
  Reporter,
  CompileEvent,
  CompileStartEvent,
  ContainerEvaluatingEvent,
  ContainerEvaluatedEvent,
  ContainerResolvedEvent,
  CompileFinishedEvent,
  CompileFailedEvent
} from './reporter.js'
export {formatDuration} from './utils.js'
