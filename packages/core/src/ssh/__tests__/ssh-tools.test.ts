/**
 * Unit tests for the ssh / ssh-keygen / ssh-add wrappers.
 */

import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SshCommandError } from '../../errors';
import { createSshTools, ensureSshDirectory, probeArgs } from '../ssh-tools';

jest.mock('child_process', () => ({
  spawnSync: jest.fn(),
}));

const mockSpawnSync = jest.mocked(spawnSync);

function spawnResult(status: number, stdout = '', stderr = '') {
  return { pid: 1, output: [], stdout, stderr, status, signal: null };
}

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

describe('createSshTools', () => {
  let tempDir: string;

  beforeEach(() => {
    mockSpawnSync.mockReset();
    tempDir = createTempDir('gitswitch-sshtools-');
  });

  afterEach(() => {
    cleanupDir(tempDir);
  });

  describe('probe', () => {
    it('runs a non-interactive ssh -T against the alias', () => {
      mockSpawnSync.mockReturnValue(spawnResult(1, '', "Hi jane! You've successfully authenticated, but GitHub does not provide shell access.\n"));

      const result = createSshTools().probe('github-work');

      expect(mockSpawnSync.mock.calls[0][0]).toBe('ssh');
      expect(mockSpawnSync.mock.calls[0][1]).toEqual([
        '-T',
        '-o',
        'ConnectTimeout=10',
        '-o',
        'StrictHostKeyChecking=accept-new',
        'git@github-work',
      ]);
      expect(result.host).toBe('github-work');
      expect(result.authenticated).toBe(true);
    });

    it('reports a rejected key', () => {
      mockSpawnSync.mockReturnValue(spawnResult(255, '', 'git@github.com: Permission denied (publickey).\n'));

      const result = createSshTools().probe('github-personal');

      expect(result.authenticated).toBe(false);
      expect(result.output).toBe('git@github.com: Permission denied (publickey).');
    });

    it('reports a probe that could not start', () => {
      mockSpawnSync.mockReturnValue({ ...spawnResult(0), status: null, error: new Error('spawnSync ssh ENOENT') });

      expect(createSshTools().probe('github-work')).toEqual({
        host: 'github-work',
        authenticated: false,
        output: 'spawnSync ssh ENOENT',
      });
    });
  });

  describe('generateKey', () => {
    it('runs ssh-keygen and restricts the key permissions', () => {
      const keyPath = path.join(tempDir, 'id_ed25519_work');
      mockSpawnSync.mockImplementation(() => {
        fs.writeFileSync(keyPath, 'private', { mode: 0o644 });
        fs.writeFileSync(`${keyPath}.pub`, 'public', { mode: 0o600 });
        return spawnResult(0);
      });

      createSshTools().generateKey(keyPath, 'jane@corp.example.com');

      expect(mockSpawnSync.mock.calls[0][0]).toBe('ssh-keygen');
      expect(mockSpawnSync.mock.calls[0][1]).toEqual([
        '-t',
        'ed25519',
        '-C',
        'jane@corp.example.com',
        '-f',
        keyPath,
      ]);
      if (process.platform !== 'win32') {
        expect(fs.statSync(keyPath).mode & 0o777).toBe(0o600);
        expect(fs.statSync(`${keyPath}.pub`).mode & 0o777).toBe(0o644);
      }
    });

    it('throws SshCommandError when ssh-keygen fails', () => {
      mockSpawnSync.mockReturnValue(spawnResult(1));

      expect(() => createSshTools().generateKey(path.join(tempDir, 'key'), 'a@b.io')).toThrow(SshCommandError);
      expect(() => createSshTools().generateKey(path.join(tempDir, 'key'), 'a@b.io')).toThrow(
        'ssh-keygen failed: exit code 1'
      );
    });
  });

  describe('addToAgent', () => {
    it('returns whether ssh-add succeeded', () => {
      mockSpawnSync.mockReturnValueOnce(spawnResult(0)).mockReturnValueOnce(spawnResult(2));
      const tools = createSshTools();

      expect(tools.addToAgent('/keys/id_ed25519_work')).toBe(true);
      expect(tools.addToAgent('/keys/id_ed25519_work')).toBe(false);
      expect(mockSpawnSync.mock.calls[0][1]).toEqual(['--', '/keys/id_ed25519_work']);
    });
  });

  it('logs commands when tracing', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    mockSpawnSync.mockReturnValue(spawnResult(0));

    createSshTools({ trace: true }).addToAgent('/keys/k');

    expect(log).toHaveBeenCalledWith('[SSH] ssh-add -- /keys/k');
    log.mockRestore();
  });
});

describe('probeArgs', () => {
  it('targets the git user on the host', () => {
    expect(probeArgs('github.com').at(-1)).toBe('git@github.com');
  });
});

describe('ensureSshDirectory', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir('gitswitch-sshdir-');
  });

  afterEach(() => {
    cleanupDir(tempDir);
  });

  it('creates a missing directory once', () => {
    const sshDir = path.join(tempDir, '.ssh');

    expect(ensureSshDirectory(sshDir)).toBe(true);
    expect(ensureSshDirectory(sshDir)).toBe(false);
    if (process.platform !== 'win32') {
      expect(fs.statSync(sshDir).mode & 0o777).toBe(0o700);
    }
  });
});
