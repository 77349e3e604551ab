import {readFile} from 'node:fs/promises'
import {extname} from 'node:path'
import {isPlainObject} from 'lodash-es'
import {type Document, isMap, isScalar, parseDocument, visit} from 'yaml'
import {DuplicateContainerNameError, InvalidBindSpecError, ValidationError} from '../errors.js'
import type {
  BindSpec,
  ContainerDefinition,
  ContainerSource,
  DefinitionSet,
  LinkConfigOverride,
  LinkOverrides,
  NetworkdValue,
  NetworkMode,
  Overlay
} from '../types.js'

type Raw = Record<string, unknown>

export function isRecord(value: unknown): value is Raw {
  return isPlainObject(value)
}

function keysOf(node: unknown): Array<{key: string; value: unknown}> {
  if (!isMap(node)) {
    return []
  }

  return node.items.map(pair => ({
    key: isScalar(pair.key) ? String(pair.key.value) : String(pair.key),
    value: pair.value
  }))
}

function firstRepeated(keys: string[]): string | undefined {
  const seen = new Set<string>()
  return keys.find(key => {
    if (seen.has(key)) {
      return true
    }

    seen.add(key)
    return false
  })
}

/**
 * Repeated keys would otherwise collapse into one entry. A repeated
 * container name or bind path is reported as its own error kind.
 */
function checkRepeatedKeys(document: Document, filePath: string): void {
  const containers = keysOf(document.get('containers', true))
  const repeatedName = firstRepeated(containers.map(({key}) => key))
  if (repeatedName !== undefined) {
    throw new DuplicateContainerNameError(repeatedName)
  }

  for (const {key: name, value} of containers) {
    const binds = isMap(value) ? keysOf(value.get('binds', true)) : []
    const repeatedBind = firstRepeated(binds.map(({key}) => key))
    if (repeatedBind !== undefined) {
      throw new InvalidBindSpecError(name, repeatedBind, 'is declared more than once')
    }
  }

  visit(document, {
    Map(_key, map) {
      const repeated = firstRepeated(keysOf(map).map(({key}) => key))
      if (repeated !== undefined) {
        throw new ValidationError(`${filePath}: key "${repeated}" is repeated`)
      }
    }
  })
}

function syntaxError(filePath: string, error: unknown): ValidationError {
  return new ValidationError(`${filePath}: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
}

/**
 * Parses a YAML or JSON definition file. JSON is checked with the JSON
 * grammar first, then read through the YAML document model like YAML.
 */
export function parseDefinitionFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext !== '.yaml' && ext !== '.yml') {
    try {
      JSON.parse(content)
    } catch (error) {
      throw syntaxError(filePath, error)
    }
  }

  const document = parseDocument(content, {uniqueKeys: false})
  if (document.errors.length > 0) {
    throw syntaxError(filePath, document.errors[0])
  }

  checkRepeatedKeys(document, filePath)
  return document.toJS()
}

function optionalBoolean(value: unknown, fallback: boolean, context: string): boolean {
  if (value === undefined || value === null) {
    return fallback
  }

  if (typeof value !== 'boolean') {
    throw new ValidationError(`${context} must be a boolean`)
  }

  return value
}

function optionalString(value: unknown, context: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${context} must be a non-empty string`)
  }

  return value
}

function stringList(value: unknown, context: string): string[] {
  if (value === undefined || value === null) {
    return []
  }

  const strings = Array.isArray(value) ? value.filter((item: unknown): item is string => typeof item === 'string') : []
  if (!Array.isArray(value) || strings.length !== value.length) {
    throw new ValidationError(`${context} must be a list of strings`)
  }

  return strings
}

function isNetworkdValue(value: unknown): value is NetworkdValue {
  if (Array.isArray(value)) {
    return value.every(item => typeof item === 'string')
  }

  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

function parseLinkOverride(value: unknown, context: string): LinkConfigOverride | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ValidationError(`${context} must be a mapping of sections`)
  }

  const override: LinkConfigOverride = {}
  for (const [sectionName, section] of Object.entries(value)) {
    if (!isRecord(section)) {
      throw new ValidationError(`${context}.${sectionName} must be a mapping`)
    }

    const fields: Record<string, NetworkdValue> = {}
    for (const [field, fieldValue] of Object.entries(section)) {
      if (!isNetworkdValue(fieldValue)) {
        throw new ValidationError(`${context}.${sectionName}.${field} must be a string, number, boolean or list of strings`)
      }

      fields[field] = fieldValue
    }

    override[sectionName] = fields
  }

  return override
}

function parseNetwork(value: unknown, context: string): {network: NetworkMode; linkOverrides: LinkOverrides} {
  if (value === undefined || value === null) {
    return {network: {mode: 'point-to-point'}, linkOverrides: {}}
  }

  if (!isRecord(value)) {
    throw new ValidationError(`${context} must be a mapping`)
  }

  const veth = value.veth ?? {}
  if (!isRecord(veth)) {
    throw new ValidationError(`${context}.veth must be a mapping`)
  }

  const enable = optionalBoolean(veth.enable, true, `${context}.veth.enable`)
  const zone = optionalString(veth.zone, `${context}.veth.zone`)
  const config = veth.config ?? {}
  if (!isRecord(config)) {
    throw new ValidationError(`${context}.veth.config must be a mapping`)
  }

  const linkOverrides: LinkOverrides = {}
  const host = parseLinkOverride(config.host, `${context}.veth.config.host`)
  const container = parseLinkOverride(config.container, `${context}.veth.config.container`)
  if (host) {
    linkOverrides.host = host
  }

  if (container) {
    linkOverrides.container = container
  }

  if (!enable) {
    return {network: {mode: 'disabled'}, linkOverrides}
  }

  return {network: zone === undefined ? {mode: 'point-to-point'} : {mode: 'bridged', zone}, linkOverrides}
}

function parseBinds(value: unknown, context: string): BindSpec[] {
  if (value === undefined || value === null) {
    return []
  }

  if (!isRecord(value)) {
    throw new ValidationError(`${context} must be a mapping keyed by container path`)
  }

  return Object.entries(value).map(([containerPath, spec]) => {
    const bindContext = `${context}."${containerPath}"`
    const options = spec ?? {}
    if (!isRecord(options)) {
      throw new ValidationError(`${bindContext} must be a mapping`)
    }

    const hostPath = optionalString(options.hostPath, `${bindContext}.hostPath`)
    return {
      containerPath,
      ...(hostPath === undefined ? {} : {hostPath}),
      options: stringList(options.options, `${bindContext}.options`),
      readOnly: optionalBoolean(options.readOnly, false, `${bindContext}.readOnly`)
    }
  })
}

function parseSource(value: Raw, context: string): ContainerSource {
  const source: ContainerSource = {}
  const path = optionalString(value.path, `${context}.path`)
  if (path !== undefined) {
    source.path = path
  }

  if (value.config !== undefined && value.config !== null) {
    if (!isRecord(value.config)) {
      throw new ValidationError(`${context}.config must be a mapping`)
    }

    source.config = value.config
  }

  return source
}

/** Applies defaults to one raw container entry. */
export function parseContainer(name: string, value: unknown, context: string): ContainerDefinition {
  const containerContext = `${context}: containers.${name}`
  const raw = value ?? {}
  if (!isRecord(raw)) {
    throw new ValidationError(`${containerContext} must be a mapping`)
  }

  const {network, linkOverrides} = parseNetwork(raw.network, `${containerContext}.network`)
  return {
    name,
    autoStart: optionalBoolean(raw.autoStart, true, `${containerContext}.autoStart`),
    restartIfChanged: optionalBoolean(raw.restartIfChanged, true, `${containerContext}.restartIfChanged`),
    network,
    linkOverrides,
    binds: parseBinds(raw.binds, `${containerContext}.binds`),
    source: parseSource(raw, containerContext)
  }
}

export function parseOverlays(value: unknown, context: string): Overlay[] {
  if (value === undefined || value === null) {
    return []
  }

  if (!Array.isArray(value)) {
    throw new ValidationError(`${context} must be a list`)
  }

  return value.map((item: unknown, index): Overlay => {
    if (typeof item === 'string') {
      return item
    }

    if (isRecord(item)) {
      return item
    }

    throw new ValidationError(`${context}[${index}] must be a path or a mapping`)
  })
}

/** Validates a parsed definition document. */
export function parseDefinitionSet(document: unknown, context: string): DefinitionSet {
  if (document === undefined || document === null) {
    return {containers: [], imports: []}
  }

  if (!isRecord(document)) {
    throw new ValidationError(`${context}: document must be a mapping`)
  }

  const containers = document.containers ?? {}
  if (!isRecord(containers)) {
    throw new ValidationError(`${context}: containers must be a mapping keyed by name`)
  }

  return {
    containers: Object.entries(containers).map(([name, value]) => parseContainer(name, value, context)),
    imports: parseOverlays(document.imports, `${context}: imports`)
  }
}

/**
 * Loads definition files (YAML or JSON). Containers and imports of several
 * files are concatenated in argument order; duplicates are left for the
 * compiler to reject.
 */
export class DefinitionLoader {
  async load(filePaths: string[]): Promise<DefinitionSet> {
    const sets: DefinitionSet[] = []
    for (const filePath of filePaths) {
      const content = await readFile(filePath, 'utf8')
      sets.push(this.parse(content, filePath))
    }

    return {
      containers: sets.flatMap(set => set.containers),
      imports: sets.flatMap(set => set.imports)
    }
  }

  parse(content: string, filePath: string): DefinitionSet {
    return parseDefinitionSet(parseDefinitionFile(content, filePath), filePath)
  }
}
