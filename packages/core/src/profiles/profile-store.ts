/**
 * In-memory set of identity profiles.
 *
 * The store is passed explicitly to every component that needs profile data;
 * nothing reads configuration from ambient state.
 */

import * as path from 'path';
import { InvalidPathError, NotConfiguredError } from '../errors';
import type { FilesystemProbe } from '../system/filesystem';
import {
  PROFILE_NAMES,
  Profile,
  ProfileIdentity,
  ProfileName,
  UPSTREAM_HOST,
} from './types';

/** Profile chosen automatically for paths under the root folder. */
export const LOCATION_BOUND_PROFILE: ProfileName = 'work';

/** Profile used everywhere else. */
export const FALLBACK_PROFILE: ProfileName = 'personal';

export interface ProfileStoreData {
  profiles: Record<ProfileName, Profile>;
  /** Root folder of the location-bound profile; empty when unset */
  rootFolder: string;
}

const DISPLAY_NAMES: Record<ProfileName, string> = {
  work: 'Work',
  personal: 'Personal',
};

/**
 * Build the fixed profile set with its conventional key paths and aliases.
 *
 * @example
 * createDefaultProfiles('/home/u/.ssh').work.sshHostAlias // 'github-work'
 */
export function createDefaultProfiles(
  sshDir: string,
  identities: Partial<Record<ProfileName, Partial<ProfileIdentity>>> = {}
): Record<ProfileName, Profile> {
  const build = (name: ProfileName): Profile => ({
    name,
    displayName: DISPLAY_NAMES[name],
    gitUserName: identities[name]?.gitUserName ?? '',
    gitUserEmail: identities[name]?.gitUserEmail ?? '',
    sshKeyPath: path.join(sshDir, `id_ed25519_${name}`),
    sshHostAlias: `github-${name}`,
  });

  return { work: build('work'), personal: build('personal') };
}

export class ProfileStore {
  private readonly profiles: Map<ProfileName, Profile> = new Map();
  private folder: string;

  constructor(data: ProfileStoreData) {
    const seenAliases = new Set<string>();
    for (const name of PROFILE_NAMES) {
      const profile = data.profiles[name];
      if (profile.sshHostAlias === UPSTREAM_HOST) {
        throw new Error(`SSH host alias for '${name}' must not be ${UPSTREAM_HOST}`);
      }
      if (seenAliases.has(profile.sshHostAlias)) {
        throw new Error(`SSH host alias '${profile.sshHostAlias}' is used by more than one profile`);
      }
      seenAliases.add(profile.sshHostAlias);
      this.profiles.set(name, { ...profile });
    }
    this.folder = data.rootFolder;
  }

  get rootFolder(): string {
    return this.folder;
  }

  get locationBound(): Profile {
    return this.get(LOCATION_BOUND_PROFILE);
  }

  get fallback(): Profile {
    return this.get(FALLBACK_PROFILE);
  }

  /**
   * Profile whose identity is complete enough to be written to git.
   *
   * @throws NotConfiguredError naming the first empty field
   */
  requireConfigured(name: ProfileName): Profile {
    const profile = this.get(name);
    const label = profile.displayName.toLowerCase();
    if (!profile.gitUserName) {
      throw new NotConfiguredError(`${label} name is not set`);
    }
    if (!profile.gitUserEmail) {
      throw new NotConfiguredError(`${label} email is not set`);
    }
    return profile;
  }

  get(name: ProfileName): Profile {
    const profile = this.profiles.get(name);
    if (!profile) {
      // Unreachable: the constructor fills every name.
      throw new Error(`Unknown profile: ${name}`);
    }
    return profile;
  }

  list(): Profile[] {
    return PROFILE_NAMES.map((name) => this.get(name));
  }

  findByHostAlias(alias: string): Profile | undefined {
    return this.list().find((profile) => profile.sshHostAlias === alias);
  }

  /**
   * Set the location-bound profile's root folder.
   *
   * The path is expanded first and must exist at this point; it is not
   * checked again when read later.
   *
   * @returns The expanded path that was stored
   */
  setRootFolder(folder: string, probe: FilesystemProbe): string {
    const expanded = probe.expand(folder);
    if (!expanded || !probe.exists(expanded)) {
      throw new InvalidPathError(expanded || folder);
    }
    this.folder = expanded;
    return expanded;
  }

  setIdentity(name: ProfileName, identity: ProfileIdentity): void {
    this.profiles.set(name, { ...this.get(name), ...identity });
  }

  /**
   * Copy of this store with another root folder. Used for per-invocation
   * overrides that must not be persisted.
   */
  withRootFolder(folder: string): ProfileStore {
    return new ProfileStore({ ...this.toData(), rootFolder: folder });
  }

  toData(): ProfileStoreData {
    return {
      profiles: { work: { ...this.get('work') }, personal: { ...this.get('personal') } },
      rootFolder: this.folder,
    };
  }
}
