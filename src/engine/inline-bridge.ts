import process from 'node:process'
import {InlineEvaluationError} from '../errors.js'
import {containerInterfaceName, containerNetworkName, resolveContainerLinkConfig} from '../core/network-config.js'
import {Priority, priorityName} from '../core/priority.js'
import type {ContainerDefinition, ModuleConfig, Overlay} from '../types.js'
import type {ContainerEvaluator, EvaluationRequest, ModuleLayer} from './evaluator.js'

const mdnsPort = 5353

const platformCpus: Record<string, string> = {
  x64: 'x86_64',
  arm64: 'aarch64',
  ia32: 'i686',
  riscv64: 'riscv64'
}

/** Platform of the running host in `<cpu>-<os>` form (e.g. "x86_64-linux"). */
export function currentHostPlatform(): string {
  return `${platformCpus[process.arch] ?? process.arch}-${process.platform}`
}

/**
 * Builds the layers injected into every inline evaluation: forced isolation
 * markers, overridable host name and platform, and, when the container is
 * networked, the mDNS firewall opening and the container side of the link at
 * normal priority so operator settings merge with them.
 */
export function injectedLayers(definition: ContainerDefinition, hostPlatform: string): ModuleLayer[] {
  const layers: ModuleLayer[] = [
    {priority: priorityName(Priority.Forced), values: {virtualisation: {nspawn: {isContainer: true}}}},
    {priority: priorityName(Priority.Default), values: {networking: {hostName: definition.name}, nixpkgs: {hostPlatform}}}
  ]

  if (definition.network.mode === 'disabled') {
    return layers
  }

  const networked: ModuleConfig = {
    networking: {
      firewall: {
        interfaces: {
          [containerInterfaceName]: {allowedTCPPorts: [mdnsPort], allowedUDPPorts: [mdnsPort]}
        }
      }
    },
    systemd: {network: {networks: {[containerNetworkName]: resolveContainerLinkConfig(definition.linkOverrides)}}}
  }

  return [...layers, {priority: priorityName(Priority.Override), values: networked}]
}

export type InlineBridgeOptions = {
  evaluator: ContainerEvaluator;
  hostPlatform?: string;
}

/**
 * Turns a container defined by inline configuration into a resolved system
 * path by handing it, with the injected layers and shared overlays, to the
 * external evaluator.
 */
export class InlineBridge {
  private readonly evaluator: ContainerEvaluator
  private readonly hostPlatform: string

  constructor(options: InlineBridgeOptions) {
    this.evaluator = options.evaluator
    this.hostPlatform = options.hostPlatform ?? currentHostPlatform()
  }

  buildRequest(definition: ContainerDefinition, overlays: Overlay[]): EvaluationRequest {
    return {
      container: definition.name,
      prefix: ['containers', definition.name],
      layers: injectedLayers(definition, this.hostPlatform),
      imports: definition.source.config ? [...overlays, definition.source.config] : [...overlays]
    }
  }

  async resolve(definition: ContainerDefinition, overlays: Overlay[]): Promise<string> {
    const request = this.buildRequest(definition, overlays)
    try {
      return await this.evaluator.evaluate(request)
    } catch (error) {
      throw new InlineEvaluationError(definition.name, {cause: error})
    }
  }
}
