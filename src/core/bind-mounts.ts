import {posix} from 'node:path'
import {InvalidBindSpecError} from '../errors.js'
import type {BindLists, BindSpec} from '../types.js'
import {compareNames} from './utils.js'

/** Shared package store, bound into every container so its binaries can run. */
export const storePath = '/nix/store'

export const storeBind: BindSpec = {
  containerPath: storePath,
  hostPath: storePath,
  options: ['idmap'],
  readOnly: true
}

/** Collapses repeated and trailing slashes and `.`/`..` segments. */
export function normalizeBindPath(path: string): string {
  const normalized = posix.normalize(path)
  return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized
}

/**
 * Validates operator binds for one container: absolute paths, unique
 * container paths, and no bind on the store path.
 */
export function validateBinds(container: string, binds: BindSpec[]): void {
  const seen = new Set<string>()
  for (const bind of binds) {
    if (!bind.containerPath.startsWith('/')) {
      throw new InvalidBindSpecError(container, bind.containerPath, 'must be an absolute path')
    }

    if (bind.hostPath !== undefined && !bind.hostPath.startsWith('/')) {
      throw new InvalidBindSpecError(container, bind.containerPath, `has a relative hostPath "${bind.hostPath}"`)
    }

    const containerPath = normalizeBindPath(bind.containerPath)
    if (containerPath === storePath) {
      throw new InvalidBindSpecError(container, bind.containerPath, 'is reserved for the package store')
    }

    if (seen.has(containerPath)) {
      throw new InvalidBindSpecError(container, bind.containerPath, 'is declared more than once')
    }

    seen.add(containerPath)
  }
}

/** Serializes a bind as `host:container[:opt1,opt2]`. */
export function formatBind(bind: BindSpec): string {
  const containerPath = normalizeBindPath(bind.containerPath)
  const hostPath = bind.hostPath === undefined ? containerPath : normalizeBindPath(bind.hostPath)
  const options = bind.options.length > 0 ? `:${bind.options.join(',')}` : ''
  return `${hostPath}:${containerPath}${options}`
}

function byContainerPath(a: BindSpec, b: BindSpec): number {
  return compareNames(normalizeBindPath(a.containerPath), normalizeBindPath(b.containerPath))
}

/**
 * Partitions binds into read-write and read-only lists, with the store bind
 * injected. Both lists are ordered by container path.
 */
export function resolveBinds(binds: BindSpec[]): BindLists {
  const all = [...binds, storeBind].sort(byContainerPath)

  return {
    readWrite: all.filter(bind => !bind.readOnly).map(bind => formatBind(bind)),
    readOnly: all.filter(bind => bind.readOnly).map(bind => formatBind(bind))
  }
}
