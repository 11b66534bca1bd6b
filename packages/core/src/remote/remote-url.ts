/**
 * Remote URL classification and rewriting.
 *
 * Only scp-style SSH remotes (`user@host:path`) are classified. HTTPS GitHub
 * remotes are first converted with `normalizeScheme`; anything else is
 * treated as customized and left untouched.
 */

import type { ProfileStore } from '../profiles/profile-store';
import { Profile, ProfileName, UPSTREAM_HOST } from '../profiles/types';

/**
 * What a remote URL is currently pointed at.
 */
export type RemoteBinding =
  | { kind: 'bound'; profile: ProfileName }
  | { kind: 'bare-upstream' }
  | { kind: 'unrecognized' };

/**
 * A remote split around its authority.
 *
 * `git@github-work:acme/widgets.git` →
 * `{ user: 'git', host: 'github-work', rest: ':acme/widgets.git' }`
 */
export interface ScpUrl {
  user: string;
  host: string;
  /** Everything from the first `:` or `/` after the host, separator included */
  rest: string;
}

const SCP_URL = /^([^@:/\s]+)@([^:/\s]+)([:/].*)$/;
const HTTPS_UPSTREAM = /^https:\/\/github\.com\/(.+)$/;

export function parseScpUrl(url: string): ScpUrl | null {
  const match = SCP_URL.exec(url.trim());
  if (!match) {
    return null;
  }
  return { user: match[1], host: match[2], rest: match[3] };
}

export function formatScpUrl(parts: ScpUrl): string {
  return `${parts.user}@${parts.host}${parts.rest}`;
}

function classifyHost(host: string, store: ProfileStore): RemoteBinding {
  const profile = store.findByHostAlias(host);
  if (profile) {
    return { kind: 'bound', profile: profile.name };
  }
  if (host === UPSTREAM_HOST) {
    return { kind: 'bare-upstream' };
  }
  return { kind: 'unrecognized' };
}

/**
 * Classify a remote URL against the store's host aliases.
 *
 * - `git@github-work:acme/widgets.git` → `{ kind: 'bound', profile: 'work' }`
 * - `git@github.com:acme/widgets.git` → `{ kind: 'bare-upstream' }`
 * - `git@gitlab.com:acme/widgets.git` → `{ kind: 'unrecognized' }`
 * - `https://github.com/acme/widgets` → `{ kind: 'unrecognized' }` (normalize first)
 */
export function classify(url: string, store: ProfileStore): RemoteBinding {
  const parts = parseScpUrl(url);
  if (!parts) {
    return { kind: 'unrecognized' };
  }
  return classifyHost(parts.host, store);
}

/**
 * Convert `https://github.com/owner/repo[.git]` to
 * `git@github.com:owner/repo[.git]`. Other URLs are returned unchanged.
 */
export function normalizeScheme(url: string): string {
  const trimmed = url.trim();
  const match = HTTPS_UPSTREAM.exec(trimmed);
  if (!match) {
    return trimmed;
  }
  return `git@${UPSTREAM_HOST}:${match[1]}`;
}

/**
 * Point a remote at `target`'s host alias.
 *
 * The authority is replaced once, whatever it was (the upstream host or any
 * profile alias), so rewriting is idempotent and a second rewrite for a
 * different profile gives the same result as rewriting the original.
 * Unrecognized URLs are returned unchanged.
 */
export function rewrite(url: string, target: Profile, store: ProfileStore): string {
  const parts = parseScpUrl(url);
  if (!parts || classifyHost(parts.host, store).kind === 'unrecognized') {
    return url;
  }
  return formatScpUrl({ ...parts, host: target.sshHostAlias });
}

/**
 * Repository directory name `git clone` will create for `url`.
 */
export function repositoryNameFromUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '');
  const lastSegment = trimmed.split(/[/:]/).pop() ?? trimmed;
  return lastSegment.replace(/\.git$/, '');
}

export function describeBinding(binding: RemoteBinding, store: ProfileStore): string {
  switch (binding.kind) {
    case 'bound':
      return `Configured for ${store.get(binding.profile).displayName.toUpperCase()}`;
    case 'bare-upstream':
      return `Using plain ${UPSTREAM_HOST} (needs configuration)`;
    case 'unrecognized':
      return 'Custom remote (left alone)';
  }
}
