import test from 'ava'
import {MergeConflictError} from '../../errors.js'
import {mergeLayers, Priority, priorityName} from '../priority.js'

// -- priorityName ------------------------------------------------------------

test('priorityName maps every tier', t => {
  t.is(priorityName(Priority.Baseline), 'baseline')
  t.is(priorityName(Priority.Default), 'default')
  t.is(priorityName(Priority.Override), 'override')
  t.is(priorityName(Priority.Forced), 'force')
})

// -- mergeLayers -------------------------------------------------------------

test('mergeLayers: a single layer is returned as is', t => {
  const result = mergeLayers([
    {priority: Priority.Baseline, source: 'base', payload: {networkConfig: {DHCP: true}}}
  ])
  t.deepEqual(result, {networkConfig: {DHCP: true}})
})

test('mergeLayers: absent payload contributes nothing', t => {
  const result = mergeLayers([
    {priority: Priority.Baseline, source: 'base', payload: {networkConfig: {DHCP: true}}},
    {priority: Priority.Override, source: 'operator'}
  ])
  t.deepEqual(result, {networkConfig: {DHCP: true}})
})

test('mergeLayers: override wins field by field without leaking into other fields', t => {
  const result = mergeLayers([
    {priority: Priority.Baseline, source: 'base', payload: {networkConfig: {DHCP: true, LLDP: true}}},
    {priority: Priority.Override, source: 'operator', payload: {networkConfig: {DHCP: false}}}
  ])
  t.deepEqual(result, {networkConfig: {DHCP: false, LLDP: true}})
})

test('mergeLayers: lists are replaced, never concatenated', t => {
  const result = mergeLayers([
    {priority: Priority.Baseline, source: 'base', payload: {networkConfig: {Address: ['0.0.0.0/30', '::/64']}}},
    {priority: Priority.Override, source: 'operator', payload: {networkConfig: {Address: ['10.23.42.1/28']}}}
  ])
  t.deepEqual(result.networkConfig.Address, ['10.23.42.1/28'])
})

test('mergeLayers: layer order does not matter, priority does', t => {
  const result = mergeLayers([
    {priority: Priority.Override, source: 'operator', payload: {networkConfig: {IPMasquerade: 'ipv4'}}},
    {priority: Priority.Baseline, source: 'base', payload: {networkConfig: {IPMasquerade: 'both'}}}
  ])
  t.is(result.networkConfig.IPMasquerade, 'ipv4')
})

test('mergeLayers: same priority, last writer wins', t => {
  const result = mergeLayers([
    {priority: Priority.Override, source: 'first', payload: {networkConfig: {DHCP: 'ipv4'}}},
    {priority: Priority.Override, source: 'second', payload: {networkConfig: {DHCP: 'ipv6'}}}
  ])
  t.is(result.networkConfig.DHCP, 'ipv6')
})

test('mergeLayers: forced beats override', t => {
  const result = mergeLayers([
    {priority: Priority.Forced, source: 'forced', payload: {networkConfig: {DHCP: true}}},
    {priority: Priority.Override, source: 'operator', payload: {networkConfig: {DHCP: false}}}
  ])
  t.is(result.networkConfig.DHCP, true)
})

test('mergeLayers: unset fields fall through', t => {
  const result = mergeLayers([
    {priority: Priority.Baseline, source: 'base', payload: {networkConfig: {DHCP: true}}},
    {priority: Priority.Override, source: 'operator', payload: {networkConfig: {DHCP: undefined, MulticastDNS: false}}}
  ])
  t.deepEqual(result, {networkConfig: {DHCP: true, MulticastDNS: false}})
})

test('mergeLayers: sections are merged independently and new sections are added', t => {
  const result = mergeLayers([
    {priority: Priority.Baseline, source: 'base', payload: {matchConfig: {Name: 've-web'}, dhcpServerConfig: {PersistLeases: false}}},
    {priority: Priority.Override, source: 'operator', payload: {dhcpServerConfig: {PoolSize: 10}, routeConfig: {Gateway: '10.0.0.1'}}}
  ])
  t.deepEqual(result, {
    matchConfig: {Name: 've-web'},
    dhcpServerConfig: {PersistLeases: false, PoolSize: 10},
    routeConfig: {Gateway: '10.0.0.1'}
  })
})

test('mergeLayers: output lists are copies of the layer lists', t => {
  const address = ['10.0.0.1/24']
  const result = mergeLayers([{priority: Priority.Override, source: 'operator', payload: {networkConfig: {Address: address}}}])
  address.push('10.0.0.2/24')
  t.deepEqual(result.networkConfig.Address, ['10.0.0.1/24'])
})

test('mergeLayers: two forced layers disagreeing throw MergeConflictError', t => {
  const error = t.throws<MergeConflictError>(() => mergeLayers([
    {priority: Priority.Forced, source: 'a', payload: {networkConfig: {DHCP: true}}},
    {priority: Priority.Forced, source: 'b', payload: {networkConfig: {DHCP: false}}}
  ]), {instanceOf: MergeConflictError})
  t.is(error?.field, 'networkConfig.DHCP')
})

test('mergeLayers: two forced layers agreeing are fine', t => {
  const result = mergeLayers([
    {priority: Priority.Forced, source: 'a', payload: {networkConfig: {Address: ['::/64']}}},
    {priority: Priority.Forced, source: 'b', payload: {networkConfig: {Address: ['::/64']}}}
  ])
  t.deepEqual(result.networkConfig.Address, ['::/64'])
})
