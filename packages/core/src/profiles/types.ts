/**
 * Profile data model.
 */

export const PROFILE_NAMES = ['work', 'personal'] as const;

export type ProfileName = (typeof PROFILE_NAMES)[number];

/** The provider's own hostname, used when a remote carries no alias. */
export const UPSTREAM_HOST = 'github.com';

/**
 * A named identity: git author fields plus the SSH key and host alias
 * that route pushes to the matching account.
 */
export interface Profile {
  name: ProfileName;
  /** Human-readable label ("Work", "Personal") */
  displayName: string;
  /** Value written to `user.name`; empty until configured */
  gitUserName: string;
  /** Value written to `user.email`; empty until configured */
  gitUserEmail: string;
  /** Absolute path of the private key */
  sshKeyPath: string;
  /** `Host` entry in the SSH client config, e.g. "github-work" */
  sshHostAlias: string;
}

export interface ProfileIdentity {
  gitUserName: string;
  gitUserEmail: string;
}
