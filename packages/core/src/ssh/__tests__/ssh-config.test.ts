/**
 * Unit tests for SSH client config generation.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createDefaultProfiles, ProfileStore } from '../../profiles/profile-store';
import { parseSshHosts, renderSshConfig, verifySshConfig, writeSshConfig } from '../ssh-config';

// Helper to create a temporary directory
function createTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

// Helper to clean up a directory
function cleanupDir(dirPath: string): void {
  try {
    fs.rmSync(dirPath, { recursive: true, force: true });
  } catch {
    // Ignore errors during cleanup
  }
}

const GENERATED_AT = new Date(2024, 0, 31, 23, 59, 0);

function createStore(sshDir = '/home/u/.ssh'): ProfileStore {
  return new ProfileStore({ profiles: createDefaultProfiles(sshDir), rootFolder: '' });
}

describe('renderSshConfig', () => {
  it('renders one stanza per profile plus the upstream default', () => {
    const expected = [
      '# ============================================================================',
      '# GitHub SSH Multi-Account Configuration',
      '# Generated: 2024-01-31 23:59:00',
      '# ============================================================================',
      '',
      '# Work GitHub account',
      'Host github-work',
      '    HostName github.com',
      '    User git',
      '    IdentityFile /home/u/.ssh/id_ed25519_work',
      '    IdentitiesOnly yes',
      '    AddKeysToAgent yes',
      '',
      '# Personal GitHub account',
      'Host github-personal',
      '    HostName github.com',
      '    User git',
      '    IdentityFile /home/u/.ssh/id_ed25519_personal',
      '    IdentitiesOnly yes',
      '    AddKeysToAgent yes',
      '',
      '# Default GitHub (personal)',
      'Host github.com',
      '    HostName github.com',
      '    User git',
      '    IdentityFile /home/u/.ssh/id_ed25519_personal',
      '    IdentitiesOnly yes',
      '    AddKeysToAgent yes',
      '',
    ].join('\n');

    expect(renderSshConfig(createStore(), GENERATED_AT)).toBe(expected);
  });

  it('quotes key paths that contain spaces', () => {
    const text = renderSshConfig(createStore('/Users/Jane Doe/.ssh'), GENERATED_AT);

    expect(text).toContain('    IdentityFile "/Users/Jane Doe/.ssh/id_ed25519_work"\n');
  });
});

describe('parseSshHosts', () => {
  it('collects every host pattern', () => {
    const hosts = parseSshHosts('Host a b\n  HostName a.example\nhost c\n# Host d\n');

    expect([...hosts]).toEqual(['a', 'b', 'c']);
  });
});

describe('writeSshConfig / verifySshConfig', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = createTempDir('gitswitch-ssh-');
    configPath = path.join(tempDir, '.ssh', 'config');
  });

  afterEach(() => {
    cleanupDir(tempDir);
  });

  it('reports a missing file', () => {
    expect(verifySshConfig(configPath, createStore())).toEqual({
      exists: false,
      missingHosts: ['github-work', 'github-personal'],
      complete: false,
    });
  });

  it('overwrites the whole file and verifies it as complete', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, 'Host old-entry\n    HostName old.example\n');

    writeSshConfig(configPath, createStore(), GENERATED_AT);

    const text = fs.readFileSync(configPath, 'utf-8');
    expect(text).toBe(renderSshConfig(createStore(), GENERATED_AT));
    expect(text).not.toContain('old-entry');
    expect(verifySshConfig(configPath, createStore())).toEqual({ exists: true, missingHosts: [], complete: true });
  });

  it('creates the SSH directory with owner-only permissions', () => {
    writeSshConfig(configPath, createStore(), GENERATED_AT);

    if (process.platform !== 'win32') {
      expect(fs.statSync(path.dirname(configPath)).mode & 0o777).toBe(0o700);
      expect(fs.statSync(configPath).mode & 0o777).toBe(0o600);
    }
  });

  it('lists aliases that have no Host entry', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, 'Host github-work\n    HostName github.com\n');

    expect(verifySshConfig(configPath, createStore())).toEqual({
      exists: true,
      missingHosts: ['github-personal'],
      complete: false,
    });
  });
});
