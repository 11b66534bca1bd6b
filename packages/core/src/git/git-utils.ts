/**
 * Git utility functions for reading and writing repository state.
 *
 * Every git invocation is a single synchronous child process; it either
 * succeeds or fails as a whole.
 */

import { execFileSync, spawnSync } from 'child_process';
import { GitCommandError } from '../errors';

/**
 * Access to the git state of one working directory.
 */
export interface GitAccessor {
  /** Working directory the commands run in */
  readonly cwd: string;
  getConfig(key: string): string | null;
  setConfig(key: string, value: string): void;
  getRemoteUrl(remoteName: string): string | null;
  setRemoteUrl(remoteName: string, url: string): void;
  isInsideRepository(): boolean;
}

export interface GitCommandOptions {
  /** Log each command with a [GIT] prefix before running it */
  trace?: boolean;
}

function traceCommand(args: string[], cwd: string, options: GitCommandOptions): void {
  if (options.trace) {
    console.log(`[GIT] git ${args.join(' ')} (in ${cwd})`);
  }
}

function stderrOf(error: unknown): string {
  if (error && typeof error === 'object' && 'stderr' in error) {
    const { stderr } = error;
    if (typeof stderr === 'string') {
      return stderr;
    }
    if (Buffer.isBuffer(stderr)) {
      return stderr.toString('utf-8');
    }
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run a git command and return its trimmed output.
 * Throws GitCommandError if git exits non-zero or cannot be started.
 */
export function runGitCommand(args: string[], cwd: string, options: GitCommandOptions = {}): string {
  traceCommand(args, cwd, options);
  try {
    const result = execFileSync('git', args, {
      cwd,
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
      timeout: 10000, // 10 second timeout
    });
    return result.trim();
  } catch (error) {
    throw new GitCommandError(args, stderrOf(error));
  }
}

/**
 * Execute a git query in the specified directory.
 * Returns null if the command fails (unset key, missing remote, not a repo).
 */
export function execGitCommand(args: string[], cwd: string, options: GitCommandOptions = {}): string | null {
  try {
    return runGitCommand(args, cwd, options);
  } catch {
    return null;
  }
}

/**
 * Create a GitAccessor bound to `cwd`.
 *
 * Writes go to the repository's local config (`git config <key> <value>`).
 */
export function createGitAccessor(cwd: string, options: GitCommandOptions = {}): GitAccessor {
  return {
    cwd,
    getConfig: (key) => execGitCommand(['config', '--get', key], cwd, options),
    setConfig: (key, value) => {
      runGitCommand(['config', key, value], cwd, options);
    },
    getRemoteUrl: (remoteName) => execGitCommand(['remote', 'get-url', remoteName], cwd, options),
    setRemoteUrl: (remoteName, url) => {
      runGitCommand(['remote', 'set-url', remoteName, url], cwd, options);
    },
    isInsideRepository: () => execGitCommand(['rev-parse', '--git-dir'], cwd, options) !== null,
  };
}

/**
 * Clone `url` into `parentDir`, streaming git's progress to the terminal.
 * A failed clone is reported, not retried.
 */
export function cloneRepository(url: string, parentDir: string, options: GitCommandOptions = {}): void {
  const args = ['clone', '--', url];
  traceCommand(args, parentDir, options);

  const result = spawnSync('git', args, { cwd: parentDir, stdio: 'inherit' });
  if (result.error) {
    throw new GitCommandError(args, result.error.message);
  }
  if (result.status !== 0) {
    throw new GitCommandError(args, `exit code ${result.status ?? 'unknown'}`);
  }
}
