import * as fs from 'fs';
import * as path from 'path';
import { MissingDependencyError } from '../errors';

export const REQUIRED_EXECUTABLES: readonly string[] = ['git', 'ssh', 'ssh-keygen'];

/**
 * Locate an executable on PATH. Returns null if it is not found.
 */
export function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const searchPath = env.PATH ?? env.Path ?? '';
  const extensions =
    process.platform === 'win32' ? (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';') : [''];

  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) {
      continue;
    }
    for (const extension of extensions) {
      const candidate = path.join(dir, name + extension);
      try {
        fs.accessSync(candidate, fs.constants.X_OK);
        if (fs.statSync(candidate).isFile()) {
          return candidate;
        }
      } catch {
        // not here, keep looking
      }
    }
  }

  return null;
}

/**
 * Ensure every required executable is on PATH.
 * Throws MissingDependencyError listing all missing commands at once.
 */
export function checkDependencies(
  names: readonly string[] = REQUIRED_EXECUTABLES,
  env: NodeJS.ProcessEnv = process.env
): void {
  const missing = names.filter((name) => findExecutable(name, env) === null);
  if (missing.length > 0) {
    throw new MissingDependencyError(missing);
  }
}
