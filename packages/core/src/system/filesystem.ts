/**
 * Filesystem probe used by the profile store and the CLI.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export interface FilesystemProbe {
  exists(targetPath: string): boolean;
  /** Expand `~`, `$VAR` and `${VAR}`, then make the result absolute. */
  expand(targetPath: string): string;
}

/**
 * Expand a user-supplied path.
 *
 * `~` and `~/...` become the home directory, `$VAR` / `${VAR}` are replaced
 * from `env` (unset variables expand to nothing), and the result is resolved
 * against `cwd`. An empty input stays empty.
 */
export function expandPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
  cwd: string = process.cwd()
): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return '';
  }

  let expanded = trimmed;
  if (expanded === '~') {
    expanded = homeDir;
  } else if (expanded.startsWith('~/')) {
    expanded = path.join(homeDir, expanded.slice(2));
  }

  expanded = expanded.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_match, braced: string | undefined, bare: string | undefined) => env[braced ?? bare ?? ''] ?? ''
  );

  return path.resolve(cwd, expanded);
}

export interface NodeFilesystemOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  cwd?: string;
}

export function createNodeFilesystem(options: NodeFilesystemOptions = {}): FilesystemProbe {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();
  const cwd = options.cwd ?? process.cwd();

  return {
    exists: (targetPath) => targetPath.length > 0 && fs.existsSync(targetPath),
    expand: (targetPath) => expandPath(targetPath, env, homeDir, cwd),
  };
}

function realPath(targetPath: string): string | null {
  try {
    return fs.realpathSync(targetPath);
  } catch {
    return null;
  }
}

/**
 * Working directory as the shell sees it.
 *
 * `process.cwd()` resolves symlinks; `PWD` keeps the path the user typed.
 * `PWD` is used only when it is absolute and names the same directory.
 */
export function logicalWorkingDirectory(
  env: NodeJS.ProcessEnv = process.env,
  physicalCwd: string = process.cwd()
): string {
  const logical = env.PWD;
  if (!logical || !path.isAbsolute(logical) || logical === physicalCwd) {
    return physicalCwd;
  }
  const resolved = realPath(logical);
  return resolved !== null && resolved === realPath(physicalCwd) ? logical : physicalCwd;
}
