import test from 'ava'
import {
  containerBaseline,
  hostBaseline,
  resolveContainerLinkConfig,
  resolveHostLinkConfig,
  resolveLinkConfigs
} from '../network-config.js'
import type {NetworkdSection} from '../../types.js'

const veth = {ifName: 've-web', kind: 'veth' as const}
const bridge = {ifName: 'vz-z1', kind: 'bridge' as const, zone: 'z1'}

// -- baselines ---------------------------------------------------------------

test('hostBaseline: point-to-point uses a /30 address template', t => {
  t.deepEqual(hostBaseline(veth).networkConfig.Address, ['0.0.0.0/30', '::/64'])
})

test('hostBaseline: bridge uses a /27 address template', t => {
  t.deepEqual(hostBaseline(bridge).networkConfig.Address, ['0.0.0.0/27', '::/64'])
})

test('hostBaseline: matches the interface by kind and name', t => {
  t.deepEqual(hostBaseline(bridge).matchConfig, {Kind: 'bridge', Name: 'vz-z1'})
})

test('hostBaseline: serves DHCP and masquerades', t => {
  const {networkConfig, dhcpServerConfig} = hostBaseline(veth)
  t.is(networkConfig.DHCPServer, true)
  t.is(networkConfig.IPMasquerade, 'both')
  t.is(networkConfig.IPv6SendRA, true)
  t.is(networkConfig.IPv6AcceptRA, false)
  t.deepEqual(dhcpServerConfig, {PersistLeases: false})
})

test('containerBaseline: DHCP client on host0', t => {
  const baseline = containerBaseline()
  t.deepEqual(baseline.matchConfig, {Kind: 'veth', Name: 'host0', Virtualization: 'container'})
  t.is(baseline.networkConfig.DHCP, true)
  t.is(baseline.networkConfig.IPv6AcceptRA, true)
  t.is(baseline.networkConfig.MulticastDNS, true)
  t.is<NetworkdSection | undefined, undefined>(baseline.dhcpServerConfig, undefined)
})

// -- resolution --------------------------------------------------------------

test('resolveLinkConfigs: without overrides both sides are the baselines', t => {
  const {host, container} = resolveLinkConfigs(veth, {})
  t.deepEqual(host, hostBaseline(veth))
  t.deepEqual(container, containerBaseline())
})

test('resolveHostLinkConfig: operator address replaces the template', t => {
  const host = resolveHostLinkConfig(veth, {host: {networkConfig: {Address: ['fd42::1/64', '10.23.42.1/28']}}})
  t.deepEqual(host.networkConfig.Address, ['fd42::1/64', '10.23.42.1/28'])
  t.is(host.networkConfig.DHCPServer, true)
  t.deepEqual(host.matchConfig, {Kind: 'veth', Name: 've-web'})
})

test('resolveHostLinkConfig: sub-sections merge one level down', t => {
  const host = resolveHostLinkConfig(bridge, {host: {dhcpServerConfig: {PoolOffset: 10}}})
  t.deepEqual(host.dhcpServerConfig, {PersistLeases: false, PoolOffset: 10})
})

test('resolveContainerLinkConfig: operator disables DHCP, rest stays', t => {
  const container = resolveContainerLinkConfig({container: {networkConfig: {DHCP: false, Address: ['10.23.42.2/28']}}})
  t.is(container.networkConfig.DHCP, false)
  t.deepEqual(container.networkConfig.Address, ['10.23.42.2/28'])
  t.is(container.networkConfig.LinkLocalAddressing, true)
})

test('resolveLinkConfigs: host override does not touch the container side', t => {
  const {container} = resolveLinkConfigs(veth, {host: {networkConfig: {DHCPServer: false}}})
  t.deepEqual(container, containerBaseline())
})
