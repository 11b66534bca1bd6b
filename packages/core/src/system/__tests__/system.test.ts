/**
 * Unit tests for path expansion and the dependency check.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MissingDependencyError } from '../../errors';
import { checkDependencies, findExecutable } from '../dependencies';
import { createNodeFilesystem, expandPath, logicalWorkingDirectory } from '../filesystem';

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

describe('expandPath', () => {
  const env = { PROJECTS: '/srv/projects', EMPTY: '' };

  it('expands the home directory', () => {
    expect(expandPath('~', env, '/home/u', '/')).toBe('/home/u');
    expect(expandPath('~/Work', env, '/home/u', '/')).toBe('/home/u/Work');
  });

  it('expands $VAR and ${VAR}', () => {
    expect(expandPath('$PROJECTS/acme', env, '/home/u', '/')).toBe('/srv/projects/acme');
    expect(expandPath('${PROJECTS}/acme', env, '/home/u', '/')).toBe('/srv/projects/acme');
  });

  it('expands unset variables to nothing', () => {
    expect(expandPath('/base/$MISSING/acme', env, '/home/u', '/')).toBe('/base/acme');
  });

  it('resolves relative paths against the working directory', () => {
    expect(expandPath('clients/acme', env, '/home/u', '/home/u/src')).toBe('/home/u/src/clients/acme');
  });

  it('keeps empty input empty', () => {
    expect(expandPath('   ', env, '/home/u', '/')).toBe('');
  });

  it('does not expand a tilde in the middle of a path', () => {
    expect(expandPath('/tmp/~/x', env, '/home/u', '/')).toBe('/tmp/~/x');
  });
});

describe('createNodeFilesystem', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir('gitswitch-fs-');
  });

  afterEach(() => {
    cleanupDir(tempDir);
  });

  it('checks existence on disk', () => {
    const probe = createNodeFilesystem({ homeDir: tempDir });

    expect(probe.exists(tempDir)).toBe(true);
    expect(probe.exists(path.join(tempDir, 'missing'))).toBe(false);
    expect(probe.exists('')).toBe(false);
  });

  it('expands with the injected home directory', () => {
    const probe = createNodeFilesystem({ homeDir: tempDir });

    expect(probe.expand('~/Work')).toBe(path.join(tempDir, 'Work'));
  });
});

describe('logicalWorkingDirectory', () => {
  let tempDir: string;
  let physical: string;
  let link: string;

  beforeEach(() => {
    tempDir = createTempDir('gitswitch-pwd-');
    physical = path.join(tempDir, 'data', 'Work');
    link = path.join(tempDir, 'Work');
    fs.mkdirSync(path.join(physical, 'widgets'), { recursive: true });
    fs.symlinkSync(physical, link, 'dir');
  });

  afterEach(() => {
    cleanupDir(tempDir);
  });

  it('keeps the symlinked path from PWD', () => {
    const logical = path.join(link, 'widgets');

    expect(logicalWorkingDirectory({ PWD: logical }, path.join(physical, 'widgets'))).toBe(logical);
  });

  it('ignores a PWD that names another directory', () => {
    const cwd = path.join(physical, 'widgets');

    expect(logicalWorkingDirectory({ PWD: tempDir }, cwd)).toBe(cwd);
    expect(logicalWorkingDirectory({ PWD: path.join(tempDir, 'missing') }, cwd)).toBe(cwd);
  });

  it('ignores a missing or relative PWD', () => {
    const cwd = path.join(physical, 'widgets');

    expect(logicalWorkingDirectory({}, cwd)).toBe(cwd);
    expect(logicalWorkingDirectory({ PWD: 'Work/widgets' }, cwd)).toBe(cwd);
  });
});

describe('checkDependencies', () => {
  let binDir: string;

  beforeEach(() => {
    binDir = createTempDir('gitswitch-bin-');
    for (const name of ['git', 'ssh']) {
      const file = path.join(binDir, name);
      fs.writeFileSync(file, '#!/bin/sh\nexit 0\n');
      fs.chmodSync(file, 0o755);
    }
    fs.writeFileSync(path.join(binDir, 'ssh-keygen'), 'not executable');
    fs.chmodSync(path.join(binDir, 'ssh-keygen'), 0o644);
  });

  afterEach(() => {
    cleanupDir(binDir);
  });

  const describeOnPosix = process.platform === 'win32' ? describe.skip : describe;

  describeOnPosix('on POSIX', () => {
    it('finds executables on PATH', () => {
      expect(findExecutable('git', { PATH: binDir })).toBe(path.join(binDir, 'git'));
    });

    it('ignores files without the execute bit', () => {
      expect(findExecutable('ssh-keygen', { PATH: binDir })).toBeNull();
    });

    it('passes when everything is present', () => {
      expect(() => checkDependencies(['git', 'ssh'], { PATH: binDir })).not.toThrow();
    });

    it('names every missing executable', () => {
      let caught: unknown;
      try {
        checkDependencies(['git', 'ssh', 'ssh-keygen', 'gpg'], { PATH: binDir });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MissingDependencyError);
      if (caught instanceof MissingDependencyError) {
        expect(caught.missing).toEqual(['ssh-keygen', 'gpg']);
        expect(caught.message).toBe('Missing required dependencies: ssh-keygen gpg');
      }
    });

    it('treats an empty PATH as having nothing', () => {
      expect(() => checkDependencies(['git'], {})).toThrow('Missing required dependencies: git');
    });
  });
});
