import type {FirewallAllowance, HostArtifactSet, LinkConfig, ResolvedContainer, TmpfilesRule} from '../types.js'
import {bridgePrefix, hostNetworkName, pointToPointPrefix} from './interface-allocator.js'
import {compareNames} from './utils.js'

/** Directory holding each container's persistent state. */
export const machinesDirectory = '/var/lib/machines'

/** Base of the host user-namespace range; owner of every state directory. */
export const userNamespaceBase = '524288'

export const machinesTarget = 'machines.target'

const mdnsPort = 5353
const dhcpServerPort = 67

export function launchUnitName(container: string): string {
  return `systemd-nspawn@${container}.service`
}

export function stateDirectory(container: string): string {
  return `${machinesDirectory}/${container}`
}

/** mDNS and DHCP are allowed on every container link, whatever its name. */
export function firewallAllowances(): FirewallAllowance[] {
  return [pointToPointPrefix, bridgePrefix].map(prefix => ({
    interfacePattern: `${prefix}-+`,
    allowedTCPPorts: [mdnsPort],
    allowedUDPPorts: [dhcpServerPort, mdnsPort]
  }))
}

export function emptyHostArtifactSet(): HostArtifactSet {
  return {
    useNetworkd: false,
    firewall: [],
    networks: {},
    tmpfiles: [],
    activation: [],
    restartTriggers: {}
  }
}

function addContainer(wiring: HostArtifactSet, container: ResolvedContainer): HostArtifactSet {
  const {definition, assignment, network, path} = container
  const networks: Record<string, LinkConfig> = {...wiring.networks}

  if (assignment && network) {
    // A shared zone keeps the configuration of its first container
    networks[hostNetworkName(assignment.ifName)] ??= network.host
  }

  const rule: TmpfilesRule = {
    type: 'd',
    path: stateDirectory(definition.name),
    user: userNamespaceBase,
    group: userNamespaceBase
  }

  return {
    useNetworkd: true,
    firewall: wiring.firewall.length > 0 ? wiring.firewall : firewallAllowances(),
    networks,
    tmpfiles: [...wiring.tmpfiles, rule],
    activation: definition.autoStart ? [...wiring.activation, definition.name] : wiring.activation,
    restartTriggers: definition.restartIfChanged
      ? {...wiring.restartTriggers, [definition.name]: path}
      : wiring.restartTriggers
  }
}

/**
 * Folds the container set into the artifacts that exist once per host.
 * Containers are visited in name order so the output is deterministic.
 */
export function generateHostWiring(containers: ResolvedContainer[]): HostArtifactSet {
  return [...containers]
    .sort((a, b) => compareNames(a.definition.name, b.definition.name))
    .reduce(addContainer, emptyHostArtifactSet())
}
