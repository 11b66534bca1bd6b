/**
 * Typed errors raised by the identity engine and its collaborators.
 *
 * Every error names the precondition that was violated; `hint` carries the
 * follow-up the user can take, when there is one.
 */

export type GitSwitchErrorCode =
  | 'NOT_CONFIGURED'
  | 'NOT_A_REPOSITORY'
  | 'INVALID_PATH'
  | 'INVALID_EMAIL'
  | 'INVALID_NAME'
  | 'NO_REMOTE'
  | 'MISSING_DEPENDENCY'
  | 'GIT_COMMAND_FAILED'
  | 'SSH_COMMAND_FAILED';

export class GitSwitchError extends Error {
  public readonly code: GitSwitchErrorCode;
  public readonly hint?: string;

  constructor(message: string, code: GitSwitchErrorCode, hint?: string) {
    super(message);
    this.name = 'GitSwitchError';
    this.code = code;
    this.hint = hint;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class NotConfiguredError extends GitSwitchError {
  constructor(detail?: string) {
    super(
      detail ? `Configuration incomplete: ${detail}` : 'No configuration found',
      'NOT_CONFIGURED',
      "Run 'gitswitch setup-config' to configure your accounts",
    );
    this.name = 'NotConfiguredError';
  }
}

export class NotARepositoryError extends GitSwitchError {
  public readonly location?: string;

  constructor(location?: string) {
    super(
      location ? `Not a git repository: ${location}` : 'Not a git repository',
      'NOT_A_REPOSITORY',
      "Run this command inside a git repository or use 'setup' to clone",
    );
    this.name = 'NotARepositoryError';
    this.location = location;
  }
}

export class InvalidPathError extends GitSwitchError {
  public readonly path: string;

  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'INVALID_PATH');
    this.name = 'InvalidPathError';
    this.path = path;
  }
}

export class InvalidEmailError extends GitSwitchError {
  public readonly email: string;

  constructor(email: string) {
    super(email ? `Invalid email format: ${email}` : 'Email cannot be empty', 'INVALID_EMAIL');
    this.name = 'InvalidEmailError';
    this.email = email;
  }
}

export class InvalidNameError extends GitSwitchError {
  constructor() {
    super('Name cannot be empty', 'INVALID_NAME');
    this.name = 'InvalidNameError';
  }
}

export class NoRemoteError extends GitSwitchError {
  public readonly remoteName: string;

  constructor(remoteName: string) {
    super(
      `No ${remoteName} remote found`,
      'NO_REMOTE',
      `Add a remote first: git remote add ${remoteName} <url>`,
    );
    this.name = 'NoRemoteError';
    this.remoteName = remoteName;
  }
}

export class MissingDependencyError extends GitSwitchError {
  public readonly missing: string[];

  constructor(missing: string[]) {
    super(
      `Missing required dependencies: ${missing.join(' ')}`,
      'MISSING_DEPENDENCY',
      'Install them with your package manager (e.g. brew install git openssh, apt-get install git openssh-client)',
    );
    this.name = 'MissingDependencyError';
    this.missing = missing;
  }
}

export class GitCommandError extends GitSwitchError {
  public readonly args: string[];
  public readonly stderr: string;

  constructor(args: string[], stderr: string) {
    const detail = stderr.trim();
    super(
      detail ? `git ${args.join(' ')} failed: ${detail}` : `git ${args.join(' ')} failed`,
      'GIT_COMMAND_FAILED',
    );
    this.name = 'GitCommandError';
    this.args = args;
    this.stderr = stderr;
  }
}

export class SshCommandError extends GitSwitchError {
  public readonly command: string;

  constructor(command: string, detail: string) {
    super(`${command} failed: ${detail}`, 'SSH_COMMAND_FAILED');
    this.name = 'SshCommandError';
    this.command = command;
  }
}
