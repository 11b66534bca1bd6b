/**
 * Identity engine for switching between work and personal git accounts.
 *
 * Resolves which profile governs a location or remote URL and rewrites the
 * repository's remote and identity settings to match.
 *
 * @example
 * import { ProfileConfigFile, ReconciliationEngine, createGitAccessor } from '@gitswitch/core';
 *
 * const store = new ProfileConfigFile(configPath, { sshDir }).load();
 * if (store) {
 *   const engine = new ReconciliationEngine(store, createGitAccessor(process.cwd()));
 *   const result = await engine.reconcileRemote(() => 'work');
 *   console.log(result.newUrl); // git@github-work:acme/widgets.git
 * }
 */

export * from './errors';
export * from './profiles';
export * from './context/context-resolver';
export * from './remote/remote-url';
export * from './git/git-utils';
export * from './ssh/ssh-config';
export * from './ssh/ssh-tools';
export * from './system/filesystem';
export * from './system/dependencies';
export * from './reconcile/reconciliation-engine';
