/**
 * Wrappers around the OpenSSH client tools.
 */

import { spawnSync } from 'child_process';
import * as fs from 'fs';
import { SshCommandError } from '../errors';

/** Text GitHub prints on `ssh -T` when the key is accepted */
export const AUTHENTICATED_MARKER = 'successfully authenticated';

export interface SshProbeResult {
  host: string;
  authenticated: boolean;
  /** Combined stdout and stderr of the probe */
  output: string;
}

export interface SshTools {
  /**
   * Run ssh-keygen for an ed25519 key. ssh-keygen asks for the passphrase on
   * the terminal.
   *
   * @throws SshCommandError if ssh-keygen fails
   */
  generateKey(keyPath: string, comment: string): void;
  /** Returns false when ssh-add fails (no agent, wrong passphrase) */
  addToAgent(keyPath: string): boolean;
  probe(host: string): SshProbeResult;
}

export interface SshToolsOptions {
  /** Log each command with an [SSH] prefix */
  trace?: boolean;
}

export function probeArgs(host: string): string[] {
  return ['-T', '-o', 'ConnectTimeout=10', '-o', 'StrictHostKeyChecking=accept-new', `git@${host}`];
}

/**
 * Create the SSH directory with owner-only permissions.
 *
 * @returns true if the directory was created
 */
export function ensureSshDirectory(sshDir: string): boolean {
  if (fs.existsSync(sshDir)) {
    return false;
  }
  fs.mkdirSync(sshDir, { recursive: true, mode: 0o700 });
  fs.chmodSync(sshDir, 0o700);
  return true;
}

export function createSshTools(options: SshToolsOptions = {}): SshTools {
  const trace = (command: string, args: string[]): void => {
    if (options.trace) {
      console.log(`[SSH] ${command} ${args.join(' ')}`);
    }
  };

  return {
    generateKey(keyPath, comment) {
      const args = ['-t', 'ed25519', '-C', comment, '-f', keyPath];
      trace('ssh-keygen', args);

      const result = spawnSync('ssh-keygen', args, { stdio: 'inherit' });
      if (result.error) {
        throw new SshCommandError('ssh-keygen', result.error.message);
      }
      if (result.status !== 0) {
        throw new SshCommandError('ssh-keygen', `exit code ${result.status ?? 'unknown'}`);
      }

      fs.chmodSync(keyPath, 0o600);
      if (fs.existsSync(`${keyPath}.pub`)) {
        fs.chmodSync(`${keyPath}.pub`, 0o644);
      }
    },

    addToAgent(keyPath) {
      const args = ['--', keyPath];
      trace('ssh-add', args);

      const result = spawnSync('ssh-add', args, { stdio: ['inherit', 'inherit', 'ignore'] });
      return !result.error && result.status === 0;
    },

    probe(host) {
      const args = probeArgs(host);
      trace('ssh', args);

      const result = spawnSync('ssh', args, {
        encoding: 'utf-8',
        stdio: ['ignore', 'pipe', 'pipe'],
        timeout: 20000,
      });
      const output = result.error ? result.error.message : `${result.stdout}${result.stderr}`;
      return { host, authenticated: output.includes(AUTHENTICATED_MARKER), output: output.trim() };
    },
  };
}
