/**
 * SSH client configuration for the profile host aliases.
 *
 * The file is always written whole; existing content is replaced, not merged.
 */

import * as fs from 'fs';
import * as path from 'path';
import { formatTimestamp } from '../profiles/config-file';
import type { ProfileStore } from '../profiles/profile-store';
import { UPSTREAM_HOST } from '../profiles/types';

const RULE = '# ' + '='.repeat(76);

export interface SshConfigVerification {
  /** Whether the config file exists at all */
  exists: boolean;
  /** Profile aliases without a `Host` entry */
  missingHosts: string[];
  complete: boolean;
}

function quoteIfNeeded(value: string): string {
  return /\s/.test(value) ? `"${value}"` : value;
}

function renderStanza(comment: string, host: string, identityFile: string): string[] {
  return [
    `# ${comment}`,
    `Host ${host}`,
    `    HostName ${UPSTREAM_HOST}`,
    '    User git',
    `    IdentityFile ${quoteIfNeeded(identityFile)}`,
    '    IdentitiesOnly yes',
    '    AddKeysToAgent yes',
  ];
}

/**
 * Render the SSH config: one stanza per profile alias, then a stanza that
 * sends the bare upstream host through the fallback profile's key.
 */
export function renderSshConfig(store: ProfileStore, generatedAt: Date = new Date()): string {
  const blocks: string[][] = [
    [RULE, '# GitHub SSH Multi-Account Configuration', `# Generated: ${formatTimestamp(generatedAt)}`, RULE],
  ];

  for (const profile of store.list()) {
    blocks.push(renderStanza(`${profile.displayName} GitHub account`, profile.sshHostAlias, profile.sshKeyPath));
  }

  const fallback = store.fallback;
  blocks.push(
    renderStanza(`Default GitHub (${fallback.name})`, UPSTREAM_HOST, fallback.sshKeyPath)
  );

  return blocks.map((block) => block.join('\n')).join('\n\n') + '\n';
}

export function writeSshConfig(filePath: string, store: ProfileStore, generatedAt?: Date): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  fs.writeFileSync(filePath, renderSshConfig(store, generatedAt), { encoding: 'utf-8', mode: 0o600 });
  fs.chmodSync(filePath, 0o600);
}

/**
 * Collect every host pattern declared by `Host` lines.
 */
export function parseSshHosts(text: string): Set<string> {
  const hosts = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const match = /^\s*Host\s+(.+)$/i.exec(line);
    if (match) {
      for (const pattern of match[1].trim().split(/\s+/)) {
        hosts.add(pattern);
      }
    }
  }
  return hosts;
}

export function verifySshConfig(filePath: string, store: ProfileStore): SshConfigVerification {
  if (!fs.existsSync(filePath)) {
    return { exists: false, missingHosts: store.list().map((p) => p.sshHostAlias), complete: false };
  }

  const hosts = parseSshHosts(fs.readFileSync(filePath, 'utf-8'));
  const missingHosts = store
    .list()
    .map((profile) => profile.sshHostAlias)
    .filter((alias) => !hosts.has(alias));

  return { exists: true, missingHosts, complete: missingHosts.length === 0 };
}
