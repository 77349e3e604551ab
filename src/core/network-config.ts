import type {InterfaceAssignment, InterfaceKind, LinkConfig, LinkConfigPair, LinkOverrides} from '../types.js'
import {mergeLayers, Priority} from './priority.js'

/** Name of the link inside every container. */
export const containerInterfaceName = 'host0'

/** Network unit name of the container-side link. */
export const containerNetworkName = '10-container-host0'

const hostPrefixLength: Record<InterfaceKind, number> = {
  bridge: 27,
  veth: 30
}

/**
 * Baseline of the host side: the host hands out addresses over DHCP and
 * masquerades the container's traffic.
 */
export function hostBaseline(assignment: InterfaceAssignment): LinkConfig {
  return {
    matchConfig: {
      Kind: assignment.kind,
      Name: assignment.ifName
    },
    networkConfig: {
      Address: [`0.0.0.0/${hostPrefixLength[assignment.kind]}`, '::/64'],
      DHCPServer: true,
      IPMasquerade: 'both',
      LinkLocalAddressing: true,
      LLDP: true,
      EmitLLDP: 'customer-bridge',
      IPv6DuplicateAddressDetection: 0,
      IPv6AcceptRA: false,
      IPv6SendRA: true,
      MulticastDNS: true
    },
    dhcpServerConfig: {
      PersistLeases: false
    }
  }
}

/** Baseline of the container side: a DHCP client with link-local addressing. */
export function containerBaseline(): LinkConfig {
  return {
    matchConfig: {
      Kind: 'veth',
      Name: containerInterfaceName,
      Virtualization: 'container'
    },
    networkConfig: {
      DHCP: true,
      LinkLocalAddressing: true,
      LLDP: true,
      EmitLLDP: 'customer-bridge',
      IPv6DuplicateAddressDetection: 0,
      IPv6AcceptRA: true,
      MulticastDNS: true
    }
  }
}

export function resolveHostLinkConfig(assignment: InterfaceAssignment, overrides: LinkOverrides): LinkConfig {
  return mergeLayers([
    {priority: Priority.Baseline, source: `${assignment.ifName} baseline`, payload: hostBaseline(assignment)},
    {priority: Priority.Override, source: `${assignment.ifName} host override`, payload: overrides.host}
  ])
}

export function resolveContainerLinkConfig(overrides: LinkOverrides): LinkConfig {
  return mergeLayers([
    {priority: Priority.Baseline, source: 'container baseline', payload: containerBaseline()},
    {priority: Priority.Override, source: 'container override', payload: overrides.container}
  ])
}

/** Both sides of a link. Without overrides each side is exactly its baseline. */
export function resolveLinkConfigs(assignment: InterfaceAssignment, overrides: LinkOverrides): LinkConfigPair {
  return {
    host: resolveHostLinkConfig(assignment, overrides),
    container: resolveContainerLinkConfig(overrides)
  }
}
