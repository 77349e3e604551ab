import {mkdir, writeFile} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import {isPlainObject} from 'lodash-es'
import type {ArtifactSet, ContainerArtifacts, LinkConfig, NetworkdValue} from '../types.js'
import {containerNetworkName} from './network-config.js'
import {launchUnitName, machinesTarget} from './host-wiring.js'
import {compareNames} from './utils.js'

export const tmpfilesFileName = '10-berth.conf'
export const dropInFileName = 'berth.conf'

type IniValue = NetworkdValue | undefined

type IniSection = {
  name: string;
  entries: Array<[string, IniValue]>;
}

const sectionNames: Record<string, string> = {
  matchConfig: 'Match',
  linkConfig: 'Link',
  networkConfig: 'Network',
  addressConfig: 'Address',
  routeConfig: 'Route',
  dhcpV4Config: 'DHCPv4',
  dhcpV6Config: 'DHCPv6',
  dhcpServerConfig: 'DHCPServer',
  ipv6AcceptRAConfig: 'IPv6AcceptRA',
  ipv6SendRAConfig: 'IPv6SendRA'
}

/** `networkConfig` → `Network`; unknown sections drop the `Config` suffix. */
export function iniSectionName(key: string): string {
  const known = sectionNames[key]
  if (known) {
    return known
  }

  const bare = key.endsWith('Config') ? key.slice(0, -'Config'.length) : key
  return bare.charAt(0).toUpperCase() + bare.slice(1)
}

function formatScalar(value: string | number | boolean): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false'
  }

  return String(value)
}

/** Renders INI sections; lists become repeated keys, unset values are skipped. */
export function renderIni(sections: IniSection[]): string {
  const blocks: string[] = []
  for (const section of sections) {
    const lines = [`[${section.name}]`]
    for (const [key, value] of section.entries) {
      if (value === undefined) {
        continue
      }

      const values = Array.isArray(value) ? value : [value]
      for (const item of values) {
        lines.push(`${key}=${formatScalar(item)}`)
      }
    }

    blocks.push(lines.join('\n'))
  }

  return `${blocks.join('\n\n')}\n`
}

export function renderLinkConfig(config: LinkConfig): string {
  return renderIni(Object.entries(config).map(([key, fields]) => ({
    name: iniSectionName(key),
    entries: Object.entries(fields)
  })))
}

export function renderNspawnUnit(container: ContainerArtifacts): string {
  const {execConfig, filesConfig, networkConfig} = container.unit
  return renderIni([
    {name: 'Exec', entries: Object.entries(execConfig)},
    {name: 'Files', entries: Object.entries(filesConfig)},
    {name: 'Network', entries: Object.entries(networkConfig)}
  ])
}

export function renderTmpfiles(set: ArtifactSet): string {
  return set.host.tmpfiles
    .map(rule => `${rule.type} ${rule.path} - ${rule.user} ${rule.group} - -\n`)
    .join('')
}

/** Stringifies with object keys sorted, so equal artifact sets serialize identically. */
export function toCanonicalJson(value: unknown): string {
  return `${JSON.stringify(sortKeys(value), null, 2)}\n`
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(item => sortKeys(item))
  }

  if (isPlainObject(value) && typeof value === 'object' && value !== null) {
    const entries = Object.entries(value).sort(([a], [b]) => compareNames(a, b))
    return Object.fromEntries(entries.map(([key, item]) => [key, sortKeys(item)]))
  }

  return value
}

/**
 * Renders an artifact set into the files consumed by systemd-nspawn,
 * systemd-networkd, systemd-tmpfiles and the host firewall.
 * @returns Relative path → file content, in a stable order
 */
export function renderArtifacts(set: ArtifactSet): Map<string, string> {
  const files = new Map<string, string>()
  const containers = Object.values(set.containers).sort((a, b) => compareNames(a.name, b.name))

  for (const container of containers) {
    files.set(`nspawn/${container.name}.nspawn`, renderNspawnUnit(container))
    if (container.network) {
      files.set(`container-network/${container.name}/${containerNetworkName}.network`, renderLinkConfig(container.network.container))
    }
  }

  for (const [name, config] of Object.entries(set.host.networks).sort(([a], [b]) => compareNames(a, b))) {
    files.set(`network/${name}.network`, renderLinkConfig(config))
  }

  if (set.host.tmpfiles.length > 0) {
    files.set(`tmpfiles.d/${tmpfilesFileName}`, renderTmpfiles(set))
  }

  if (set.host.activation.length > 0) {
    files.set(`system/${machinesTarget}.d/${dropInFileName}`, renderIni([{
      name: 'Unit',
      entries: [['Wants', set.host.activation.map(name => launchUnitName(name))]]
    }]))
  }

  for (const [name, path] of Object.entries(set.host.restartTriggers).sort(([a], [b]) => compareNames(a, b))) {
    files.set(`system/${launchUnitName(name)}.d/${dropInFileName}`, renderIni([{
      name: 'Unit',
      entries: [['X-Restart-Triggers', path]]
    }]))
  }

  if (set.host.firewall.length > 0) {
    files.set('firewall.json', toCanonicalJson(set.host.firewall))
  }

  files.set('artifacts.json', toCanonicalJson(set))
  return files
}

/** Writes rendered files below `outDir`, creating directories as needed. */
export async function writeArtifacts(outDir: string, files: Map<string, string>): Promise<string[]> {
  const written: string[] = []
  for (const [relativePath, content] of files) {
    const target = join(outDir, relativePath)
    await mkdir(dirname(target), {recursive: true})
    await writeFile(target, content, 'utf8')
    written.push(target)
  }

  return written
}
