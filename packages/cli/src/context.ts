import {
    checkDependencies,
    cloneRepository,
    createGitAccessor,
    createNodeFilesystem,
    createSshTools,
    FilesystemProbe,
    GitAccessor,
    NotARepositoryError,
    NotConfiguredError,
    ProfileConfigFile,
    ProfileStore,
    REQUIRED_EXECUTABLES,
    SshTools,
} from "@gitswitch/core";
import type { CliConfig } from "./config";
import type { Output } from "./output";
import { createInquirerPrompter, Prompter } from "./prompts";

/**
 * Everything a command needs. Built once per invocation.
 */
export interface CliContext {
    config: CliConfig;
    output: Output;
    prompter: Prompter;
    fs: FilesystemProbe;
    ssh: SshTools;
    configFile: ProfileConfigFile;
    cwd: string;
    /** Expanded --path value; replaces the stored root folder for this run only */
    overridePath?: string;
    createGit(cwd: string): GitAccessor;
    cloneRepository(url: string, parentDir: string): void;
    checkDependencies(): void;
}

export type CliServices = Pick<CliContext, "prompter" | "ssh" | "createGit" | "cloneRepository" | "checkDependencies">;

export interface CreateCliContextOptions {
    config: CliConfig;
    output: Output;
    env: NodeJS.ProcessEnv;
    cwd: string;
    services?: Partial<CliServices>;
}

export function createCliContext(options: CreateCliContextOptions): CliContext {
    const { config, output, env, cwd } = options;
    const gitOptions = { trace: config.trace };
    const fs = createNodeFilesystem({ env, homeDir: config.homeDir, cwd });

    return {
        config,
        output,
        fs,
        configFile: new ProfileConfigFile(config.configFile, {
            sshDir: config.sshDir,
            defaultRootFolder: config.defaultRootFolder,
            probe: fs,
        }),
        cwd,
        prompter: createInquirerPrompter(),
        ssh: createSshTools(gitOptions),
        createGit: (dir) => createGitAccessor(dir, gitOptions),
        cloneRepository: (url, parentDir) => cloneRepository(url, parentDir, gitOptions),
        checkDependencies: () => checkDependencies(REQUIRED_EXECUTABLES, env),
        ...options.services,
    };
}

/**
 * Load the saved profiles, with the --path override applied.
 *
 * @throws NotConfiguredError when no configuration file exists
 */
export function loadStore(ctx: CliContext): ProfileStore {
    const store = ctx.configFile.load();
    if (!store) {
        throw new NotConfiguredError();
    }
    return ctx.overridePath ? store.withRootFolder(ctx.overridePath) : store;
}

/**
 * Like loadStore, but an unconfigured tool yields empty profiles.
 */
export function loadStoreOrEmpty(ctx: CliContext): ProfileStore {
    const store = ctx.configFile.load() ?? ctx.configFile.createEmpty();
    return ctx.overridePath ? store.withRootFolder(ctx.overridePath) : store;
}

/**
 * Git accessor for the working directory.
 *
 * @throws NotARepositoryError outside a git working tree
 */
export function requireRepository(ctx: CliContext): GitAccessor {
    const git = ctx.createGit(ctx.cwd);
    if (!git.isInsideRepository()) {
        throw new NotARepositoryError();
    }
    return git;
}
