/**
 * Decides which profile governs a filesystem location.
 */

import * as path from 'path';
import type { ProfileStore } from '../profiles/profile-store';
import type { ProfileName } from '../profiles/types';

/**
 * `prefix` compares raw strings, so a root of `/home/u/Work` also claims
 * `/home/u/WorkXYZ`. `segment` compares whole path components.
 */
export type PathMatchMode = 'prefix' | 'segment';

export interface ResolveContextOptions {
  /** Replaces the store's root folder for this call only; never persisted */
  overridePath?: string;
  /** Default: 'prefix' */
  matchMode?: PathMatchMode;
}

export interface ResolvedContext {
  profile: ProfileName;
  /** Whether the location rule matched or the fallback applied */
  source: 'location' | 'fallback';
  /** Root folder that was compared against (empty when unset) */
  rootFolder: string;
}

export function isUnderRootFolder(
  currentPath: string,
  rootFolder: string,
  matchMode: PathMatchMode = 'prefix'
): boolean {
  if (!rootFolder) {
    return false;
  }

  if (matchMode === 'prefix') {
    return currentPath.startsWith(rootFolder);
  }

  if (path.isAbsolute(rootFolder) !== path.isAbsolute(currentPath)) {
    return false;
  }
  const rootSegments = rootFolder.split(/[\\/]+/).filter(Boolean);
  const pathSegments = currentPath.split(/[\\/]+/).filter(Boolean);
  return (
    rootSegments.length <= pathSegments.length &&
    rootSegments.every((segment, index) => pathSegments[index] === segment)
  );
}

/**
 * Resolve the profile for `currentPath`.
 *
 * The location-bound profile wins when its root folder is set and contains
 * the path; every other path, including the empty one, falls through to the
 * fallback profile.
 */
export function resolveContext(
  currentPath: string,
  store: ProfileStore,
  options: ResolveContextOptions = {}
): ResolvedContext {
  const rootFolder = options.overridePath ?? store.rootFolder;

  if (isUnderRootFolder(currentPath, rootFolder, options.matchMode)) {
    return { profile: store.locationBound.name, source: 'location', rootFolder };
  }

  return { profile: store.fallback.name, source: 'fallback', rootFolder };
}

export function resolveProfile(
  currentPath: string,
  store: ProfileStore,
  overridePath?: string
): ProfileName {
  return resolveContext(currentPath, store, { overridePath }).profile;
}
