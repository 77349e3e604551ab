import {isEqual, isPlainObject} from 'lodash-es'
import {MergeConflictError} from '../errors.js'
import type {LinkConfig, LinkConfigOverride, NetworkdSection, NetworkdValue} from '../types.js'

/**
 * Priority tiers of a layered configuration, lowest first.
 * A set field in a higher tier always wins over the same field in a lower one.
 */
export enum Priority {
  Baseline = 0,
  Default = 1,
  Override = 2,
  Forced = 3
}

const priorityNames: Record<Priority, string> = {
  [Priority.Baseline]: 'baseline',
  [Priority.Default]: 'default',
  [Priority.Override]: 'override',
  [Priority.Forced]: 'force'
}

export function priorityName(priority: Priority): string {
  return priorityNames[priority]
}

export type Layer<T> = {
  priority: Priority;
  /** Where the payload came from, for error messages. */
  source: string;
  /** An absent payload contributes nothing. */
  payload?: T;
}

type Winner = {
  priority: Priority;
  value: NetworkdValue;
}

/**
 * Reduces link-configuration layers into one configuration.
 *
 * Layers are stably ordered by priority and every field of every section is
 * resolved independently: the last layer that sets it wins. Lists are
 * replaced, never concatenated. Sections are merged one level deep only.
 */
export function mergeLayers(layers: ReadonlyArray<Layer<LinkConfigOverride>>): LinkConfig {
  const ordered = [...layers].sort((a, b) => a.priority - b.priority)
  const winners = new Map<string, Map<string, Winner>>()

  for (const layer of ordered) {
    if (!layer.payload) {
      continue
    }

    for (const [sectionName, section] of Object.entries(layer.payload)) {
      if (!isPlainObject(section)) {
        continue
      }

      let fields = winners.get(sectionName)
      if (!fields) {
        fields = new Map()
        winners.set(sectionName, fields)
      }

      for (const [field, value] of Object.entries(section)) {
        if (value === undefined) {
          continue
        }

        const previous = fields.get(field)
        if (previous?.priority === Priority.Forced && layer.priority === Priority.Forced && !isEqual(previous.value, value)) {
          throw new MergeConflictError(`${sectionName}.${field}`)
        }

        fields.set(field, {priority: layer.priority, value})
      }
    }
  }

  const result: LinkConfig = {}
  for (const [sectionName, fields] of winners) {
    const section: NetworkdSection = {}
    for (const [field, {value}] of fields) {
      section[field] = Array.isArray(value) ? [...value] : value
    }

    result[sectionName] = section
  }

  return result
}
