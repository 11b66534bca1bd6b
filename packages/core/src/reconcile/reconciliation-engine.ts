/**
 * Reconciliation of a repository's remote URL and git identity with a profile.
 *
 * The engine is the entry point the command layer talks to: it resolves
 * profiles for paths, classifies remotes and rewrites the persisted git
 * state. Writing the URL and writing the identity are separate idempotent
 * steps and a failure in one does not roll back the other. When the
 * identity step fails after the URL was rewritten, a later run finds the
 * remote already bound and reports `unchanged`; `applyIdentity` restores
 * the identity.
 */

import {
  resolveContext,
  ResolveContextOptions,
  ResolvedContext,
} from '../context/context-resolver';
import { NoRemoteError, NotARepositoryError } from '../errors';
import type { GitAccessor } from '../git/git-utils';
import type { ProfileStore } from '../profiles/profile-store';
import type { Profile, ProfileName } from '../profiles/types';
import { classify, normalizeScheme, RemoteBinding, rewrite } from '../remote/remote-url';

export const IDENTITY_CONFIG_KEYS = {
  userName: 'user.name',
  userEmail: 'user.email',
  sshCommand: 'core.sshCommand',
} as const;

export const DEFAULT_REMOTE = 'origin';

/**
 * Information handed to the profile chooser.
 */
export interface ChooseProfileContext {
  /** The URL as found, before scheme normalization */
  currentUrl: string;
  binding: RemoteBinding;
  profiles: Profile[];
}

export type ChooseProfile = (context: ChooseProfileContext) => ProfileName | Promise<ProfileName>;

/**
 * - `left-alone`: the remote points somewhere this tool does not manage
 * - `unchanged`: already bound to the chosen profile; nothing written
 * - `rebound`: URL rewritten and identity applied
 */
export type ReconcileStatus = 'left-alone' | 'unchanged' | 'rebound';

export interface ReconcileResult {
  status: ReconcileStatus;
  oldUrl: string;
  newUrl: string;
  previous: RemoteBinding;
  profileApplied?: ProfileName;
}

/**
 * The remote as it is before reconciliation.
 */
export interface RemoteState {
  remoteName: string;
  url: string;
  binding: RemoteBinding;
}

export interface ReconciliationEngineOptions {
  /** Remote to read and rewrite. Default: 'origin' */
  remoteName?: string;
}

/**
 * `core.sshCommand` value that forces `profile`'s key.
 */
export function buildSshCommand(profile: Profile): string {
  return `ssh -i ${profile.sshKeyPath} -o IdentitiesOnly=yes`;
}

export class ReconciliationEngine {
  private readonly store: ProfileStore;
  private readonly git: GitAccessor;
  private readonly remoteName: string;

  constructor(store: ProfileStore, git: GitAccessor, options: ReconciliationEngineOptions = {}) {
    this.store = store;
    this.git = git;
    this.remoteName = options.remoteName ?? DEFAULT_REMOTE;
  }

  resolve(currentPath: string, options: ResolveContextOptions = {}): ResolvedContext {
    return resolveContext(currentPath, this.store, options);
  }

  classify(url: string): RemoteBinding {
    return classify(normalizeScheme(url), this.store);
  }

  /**
   * Write `user.name`, `user.email` and `core.sshCommand` for `name`.
   * No other git setting is touched.
   *
   * @throws NotConfiguredError if the profile has no name or email yet
   */
  applyIdentity(name: ProfileName): Profile {
    const profile = this.store.requireConfigured(name);
    this.git.setConfig(IDENTITY_CONFIG_KEYS.userName, profile.gitUserName);
    this.git.setConfig(IDENTITY_CONFIG_KEYS.userEmail, profile.gitUserEmail);
    this.git.setConfig(IDENTITY_CONFIG_KEYS.sshCommand, buildSshCommand(profile));
    return profile;
  }

  /**
   * Bring the remote URL and git identity in line with a chosen profile.
   *
   * The chooser is only consulted when the URL is managed by this tool
   * (bare upstream or bound to a profile alias).
   */
  async reconcile(currentUrl: string, chooseProfile: ChooseProfile): Promise<ReconcileResult> {
    const normalized = normalizeScheme(currentUrl);
    const previous = classify(normalized, this.store);

    if (previous.kind === 'unrecognized') {
      return { status: 'left-alone', oldUrl: currentUrl, newUrl: currentUrl, previous };
    }

    const target = await chooseProfile({ currentUrl, binding: previous, profiles: this.store.list() });

    if (previous.kind === 'bound' && previous.profile === target) {
      return { status: 'unchanged', oldUrl: currentUrl, newUrl: currentUrl, previous, profileApplied: target };
    }

    const profile = this.store.requireConfigured(target);
    const newUrl = rewrite(normalized, profile, this.store);
    if (newUrl !== currentUrl) {
      this.git.setRemoteUrl(this.remoteName, newUrl);
    }
    this.applyIdentity(target);

    return { status: 'rebound', oldUrl: currentUrl, newUrl, previous, profileApplied: target };
  }

  /**
   * Read and classify the configured remote of the repository the accessor
   * points at.
   *
   * @throws NotARepositoryError outside a git working tree
   * @throws NoRemoteError when the remote is not configured
   */
  readRemote(): RemoteState {
    if (!this.git.isInsideRepository()) {
      throw new NotARepositoryError(this.git.cwd);
    }

    const url = this.git.getRemoteUrl(this.remoteName);
    if (!url) {
      throw new NoRemoteError(this.remoteName);
    }

    return { remoteName: this.remoteName, url, binding: this.classify(url) };
  }

  /**
   * Reconcile the configured remote of the repository the accessor points at.
   *
   * @throws NotARepositoryError outside a git working tree
   * @throws NoRemoteError when the remote is not configured
   */
  async reconcileRemote(chooseProfile: ChooseProfile): Promise<ReconcileResult> {
    return this.reconcile(this.readRemote().url, chooseProfile);
  }
}
