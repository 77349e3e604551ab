// ---------------------------------------------------------------------------
// Shared container domain types.
//
// Definitions are authored by the operator; everything else is derived by
// the compiler and recomputed in full on every resolution pass.
// ---------------------------------------------------------------------------

// -- Building blocks --------------------------------------------------------

/** Scalar or list value accepted in a systemd-networkd section. */
export type NetworkdValue = string | number | boolean | string[]

/** One `[Section]` of a `.network` file (e.g. `networkConfig`). */
export type NetworkdSection = Record<string, NetworkdValue>

/** A full link configuration, keyed by section (`matchConfig`, `networkConfig`, `dhcpServerConfig`...). */
export type LinkConfig = Record<string, NetworkdSection>

/** Operator-supplied partial link configuration. Unset fields fall through to the baseline. */
export type LinkConfigOverride = Record<string, Partial<NetworkdSection>>

/** Opaque module fragment handed to the inline evaluator. */
export type ModuleConfig = Record<string, unknown>

/** A shared overlay: either a module file reference or an inline module fragment. */
export type Overlay = string | ModuleConfig

/** Host-to-container bind mount. */
export type BindSpec = {
  /** Absolute path inside the container. Unique per container. */
  containerPath: string;
  /** Path on the host. Defaults to `containerPath` when absent. */
  hostPath?: string;
  /** Bind options as understood by systemd-nspawn (e.g. "idmap"). */
  options: string[];
  readOnly: boolean;
}

export type NetworkMode =
  | {mode: 'disabled'}
  | {mode: 'point-to-point'}
  | {mode: 'bridged'; zone: string}

export type LinkOverrides = {
  host?: LinkConfigOverride;
  container?: LinkConfigOverride;
}

/** Exactly one of `config` and `path` must be set. */
export type ContainerSource = {
  /** Inline module evaluated by the external evaluator. */
  config?: ModuleConfig;
  /** Prebuilt system path (e.g. a system profile). */
  path?: string;
}

// -- Definition types -------------------------------------------------------

/** One named container's desired state, after defaults have been applied. */
export type ContainerDefinition = {
  name: string;
  /** Pull the launch unit into machines.target. */
  autoStart: boolean;
  /** Restart the launch unit whenever the resolved system path changes. */
  restartIfChanged: boolean;
  network: NetworkMode;
  linkOverrides: LinkOverrides;
  binds: BindSpec[];
  source: ContainerSource;
}

/** Everything a resolution pass consumes. */
export type DefinitionSet = {
  containers: ContainerDefinition[];
  /** Overlays applied to every inline evaluation, in order. */
  imports: Overlay[];
}

// -- Derived types ----------------------------------------------------------

export type InterfaceKind = 'veth' | 'bridge'

export type InterfaceAssignment = {
  /** Host-side interface name, at most 15 characters. */
  ifName: string;
  kind: InterfaceKind;
  /** Only set for bridged links. */
  zone?: string;
}

export type BindLists = {
  readWrite: string[];
  readOnly: string[];
}

export type ExecConfig = {
  Ephemeral: boolean;
  Boot: boolean;
  Parameters: string;
  PrivateUsers: string;
  LinkJournal: string;
  Timezone: string;
  KillSignal: string;
}

export type FilesConfig = {
  PrivateUsersOwnership: string;
  Bind: string[];
  BindReadOnly: string[];
}

export type UnitNetworkConfig = {
  Private: boolean;
  VirtualEthernet: boolean;
  Zone?: string;
}

/** Parameters of a `.nspawn` launch unit. Always replaced wholesale. */
export type UnitArtifact = {
  execConfig: ExecConfig;
  filesConfig: FilesConfig;
  networkConfig: UnitNetworkConfig;
}

export type LinkConfigPair = {
  host: LinkConfig;
  container: LinkConfig;
}

/** A container after resolution: what the unit and host wiring stages consume. */
export type ResolvedContainer = {
  definition: ContainerDefinition;
  /** Resolved system path (prebuilt or produced by the inline evaluator). */
  path: string;
  assignment?: InterfaceAssignment;
  /** Both sides of the link; absent when networking is disabled. */
  network?: LinkConfigPair;
  binds: BindLists;
}

export type ContainerArtifacts = {
  name: string;
  path: string;
  interface?: InterfaceAssignment;
  network?: LinkConfigPair;
  unit: UnitArtifact;
}

export type FirewallAllowance = {
  /** Wildcard interface pattern (e.g. "ve-+"). */
  interfacePattern: string;
  allowedTCPPorts: number[];
  allowedUDPPorts: number[];
}

export type TmpfilesRule = {
  type: 'd';
  path: string;
  user: string;
  group: string;
}

export type HostArtifactSet = {
  useNetworkd: boolean;
  firewall: FirewallAllowance[];
  /** Host-side link configs keyed by network unit name (e.g. "10-ve-web"). */
  networks: Record<string, LinkConfig>;
  tmpfiles: TmpfilesRule[];
  /** Names of containers whose launch unit is wanted by machines.target. */
  activation: string[];
  /** Container name → value whose change restarts the launch unit. */
  restartTriggers: Record<string, string>;
}

/** Output of one resolution pass. */
export type ArtifactSet = {
  containers: Record<string, ContainerArtifacts>;
  host: HostArtifactSet;
}

/** Project-level `.berth.yml` configuration. */
export type BerthConfig = {
  /** Shared overlays prepended to the ones declared in definition files. */
  imports?: Overlay[];
  /** Platform inherited by inline-evaluated containers (e.g. "x86_64-linux"). */
  hostPlatform?: string;
  evaluator?: {
    command: string;
    args?: string[];
  };
}
