import {NameTooLongError} from '../errors.js'
import type {InterfaceAssignment, InterfaceKind, NetworkMode} from '../types.js'

/** Kernel limit for network interface names (IFNAMSIZ - 1). */
export const maxInterfaceNameLength = 15

export const pointToPointPrefix = 've'
export const bridgePrefix = 'vz'

const kindByPrefix: Record<string, InterfaceKind> = {
  [pointToPointPrefix]: 'veth',
  [bridgePrefix]: 'bridge'
}

/**
 * Derives the host-side interface for a container.
 *
 * Point-to-point links are named after the container, bridged links after
 * their zone, so every container naming the same zone shares one bridge.
 * Returns `undefined` when networking is disabled.
 */
export function allocateInterface(name: string, network: NetworkMode): InterfaceAssignment | undefined {
  if (network.mode === 'disabled') {
    return undefined
  }

  const prefix = network.mode === 'bridged' ? bridgePrefix : pointToPointPrefix
  const suffix = network.mode === 'bridged' ? network.zone : name
  const ifName = `${prefix}-${suffix}`

  if (ifName.length > maxInterfaceNameLength) {
    throw new NameTooLongError(name, ifName, maxInterfaceNameLength)
  }

  const kind = kindByPrefix[prefix]
  return network.mode === 'bridged' ? {ifName, kind, zone: network.zone} : {ifName, kind}
}

/** Name of the host-side networkd unit for an interface. */
export function hostNetworkName(ifName: string): string {
  return `10-${ifName}`
}
