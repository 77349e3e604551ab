import type {ResolvedContainer, UnitArtifact} from '../types.js'

/**
 * Assembles the `.nspawn` parameters of one container.
 *
 * The container runs its own init from the resolved system path on an
 * ephemeral root, in a user namespace with a picked UID/GID range. The
 * persistent state directory is chowned on first boot so the same range
 * is reused afterwards.
 */
export function generateUnit(container: ResolvedContainer): UnitArtifact {
  const {definition, path, assignment, binds} = container

  return {
    execConfig: {
      Ephemeral: true,
      Boot: false,
      Parameters: `${path}/init`,
      PrivateUsers: 'pick',
      LinkJournal: 'try-host',
      Timezone: 'off',
      // Orderly shutdown of the guest's init
      KillSignal: 'SIGRTMIN+3'
    },
    filesConfig: {
      PrivateUsersOwnership: 'chown',
      Bind: [...binds.readWrite],
      BindReadOnly: [...binds.readOnly]
    },
    networkConfig: {
      Private: true,
      VirtualEthernet: definition.network.mode !== 'disabled',
      ...(assignment?.zone === undefined ? {} : {Zone: assignment.zone})
    }
  }
}
