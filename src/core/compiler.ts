import {
  BerthError,
  ConflictingSourceSpecificationError,
  DuplicateContainerNameError,
  ValidationError
} from '../errors.js'
import type {InlineBridge} from '../engine/inline-bridge.js'
import type {
  ArtifactSet,
  ContainerArtifacts,
  ContainerDefinition,
  DefinitionSet,
  InterfaceAssignment,
  Overlay,
  ResolvedContainer
} from '../types.js'
import {resolveBinds, validateBinds} from './bind-mounts.js'
import {generateHostWiring} from './host-wiring.js'
import {allocateInterface} from './interface-allocator.js'
import {resolveLinkConfigs} from './network-config.js'
import {noopReporter, type Reporter} from './reporter.js'
import {generateUnit} from './unit-generator.js'
import {compareNames} from './utils.js'

export type CompilerOptions = {
  /** Required as soon as one container is defined by inline configuration. */
  bridge?: InlineBridge;
  reporter?: Reporter;
  /** Overlays prepended to the definition set's own imports. */
  imports?: Overlay[];
}

const identifierPattern = /^[\w-]+$/

export function validateContainerName(name: string): void {
  if (!identifierPattern.test(name)) {
    throw new ValidationError(`Invalid container name '${name}': must contain only alphanumeric characters, underscore, and hyphen`)
  }
}

/** Zones name a bridge and a network file, so they follow the container name rule. */
export function validateZone(definition: ContainerDefinition): void {
  if (definition.network.mode !== 'bridged') {
    return
  }

  const {zone} = definition.network
  if (!identifierPattern.test(zone)) {
    throw new ValidationError(`Container "${definition.name}": invalid zone '${zone}': must contain only alphanumeric characters, underscore, and hyphen`)
  }
}

function validateSource(definition: ContainerDefinition): void {
  const {config, path} = definition.source
  if (config !== undefined && path !== undefined) {
    throw new ConflictingSourceSpecificationError(definition.name, 'both "config" and "path" are set')
  }

  if (config === undefined && path === undefined) {
    throw new ConflictingSourceSpecificationError(definition.name, 'one of "config" or "path" is required')
  }

  if (path !== undefined && !path.startsWith('/')) {
    throw new ValidationError(`Container "${definition.name}": path '${path}' must be absolute`)
  }
}

/**
 * Checks a whole definition set before anything is generated.
 * @returns Definitions sorted by name
 */
export function validateDefinitions(definitions: ContainerDefinition[]): ContainerDefinition[] {
  const seen = new Set<string>()
  for (const definition of definitions) {
    if (seen.has(definition.name)) {
      throw new DuplicateContainerNameError(definition.name)
    }

    seen.add(definition.name)
    validateContainerName(definition.name)
    validateZone(definition)
    validateSource(definition)
    validateBinds(definition.name, definition.binds)
  }

  return [...definitions].sort((a, b) => compareNames(a.name, b.name))
}

/** Validates definitions and allocates every interface, without evaluating anything. */
export function checkDefinitions(definitions: ContainerDefinition[]): Map<string, InterfaceAssignment | undefined> {
  const sorted = validateDefinitions(definitions)
  return new Map(sorted.map(definition => [definition.name, allocateInterface(definition.name, definition.network)]))
}

function toArtifacts(container: ResolvedContainer): ContainerArtifacts {
  const {definition, path, assignment, network} = container
  return {
    name: definition.name,
    path,
    ...(assignment ? {interface: assignment} : {}),
    ...(network ? {network} : {}),
    unit: generateUnit(container)
  }
}

/**
 * Compiles a definition set into the artifacts consumed by the host.
 *
 * The pass is all-or-nothing: any validation or evaluation failure rejects
 * and no artifact is returned. Apart from the evaluator call the result is
 * a pure function of the input.
 */
export class Compiler {
  private readonly bridge?: InlineBridge
  private readonly reporter: Reporter
  private readonly imports: Overlay[]

  constructor(options: CompilerOptions = {}) {
    this.bridge = options.bridge
    this.reporter = options.reporter ?? noopReporter
    this.imports = options.imports ?? []
  }

  async compile(set: DefinitionSet): Promise<ArtifactSet> {
    const startedAt = Date.now()
    try {
      const artifacts = await this.run(set)
      this.reporter.emit({
        event: 'COMPILE_FINISHED',
        containerCount: Object.keys(artifacts.containers).length,
        durationMs: Date.now() - startedAt
      })
      return artifacts
    } catch (error) {
      this.reporter.emit({
        event: 'COMPILE_FAILED',
        code: error instanceof BerthError ? error.code : undefined,
        message: error instanceof Error ? error.message : String(error)
      })
      throw error
    }
  }

  private async run(set: DefinitionSet): Promise<ArtifactSet> {
    const definitions = validateDefinitions(set.containers)
    const assignments = definitions.map(definition => allocateInterface(definition.name, definition.network))
    const inlineCount = definitions.filter(definition => definition.source.config !== undefined).length

    if (inlineCount > 0 && !this.bridge) {
      throw new ValidationError('Containers defined by inline "config" need an evaluator')
    }

    this.reporter.emit({event: 'COMPILE_START', containerCount: definitions.length, inlineCount})

    const overlays = [...this.imports, ...set.imports]
    const paths = await Promise.all(definitions.map(async definition => this.resolvePath(definition, overlays)))

    const resolved: ResolvedContainer[] = definitions.map((definition, index) => {
      const assignment = assignments[index]
      const container: ResolvedContainer = {
        definition,
        path: paths[index],
        ...(assignment ? {assignment, network: resolveLinkConfigs(assignment, definition.linkOverrides)} : {}),
        binds: resolveBinds(definition.binds)
      }
      this.reporter.emit({event: 'CONTAINER_RESOLVED', container: definition.name, path: container.path, ifName: assignment?.ifName})
      return container
    })

    const containers: Record<string, ContainerArtifacts> = {}
    for (const container of resolved) {
      containers[container.definition.name] = toArtifacts(container)
    }

    return {containers, host: generateHostWiring(resolved)}
  }

  private async resolvePath(definition: ContainerDefinition, overlays: Overlay[]): Promise<string> {
    if (definition.source.path !== undefined) {
      return definition.source.path
    }

    if (!this.bridge) {
      throw new ValidationError(`Container "${definition.name}": inline "config" needs an evaluator`)
    }

    const startedAt = Date.now()
    this.reporter.emit({event: 'CONTAINER_EVALUATING', container: definition.name})
    const path = await this.bridge.resolve(definition, overlays)
    this.reporter.emit({event: 'CONTAINER_EVALUATED', container: definition.name, path, durationMs: Date.now() - startedAt})
    return path
  }
}
