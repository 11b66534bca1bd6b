import { ProfileStore, resolveContext, verifySshConfig } from "@gitswitch/core";
import { CliContext, loadStoreOrEmpty } from "../context";
import { showCurrentConfiguration } from "./status";

function orNotSet(value: string): string {
    return value || "<not set>";
}

function printConfiguration(ctx: CliContext, store: ProfileStore): void {
    const { output } = ctx;

    output.section("Configuration");
    output.field("Work Folder:   ", orNotSet(store.rootFolder));
    for (const profile of store.list()) {
        output.field(`${profile.displayName} Name: `.padEnd(15), orNotSet(profile.gitUserName));
        output.field(`${profile.displayName} Email:`.padEnd(15), orNotSet(profile.gitUserEmail));
    }
    output.line();
}

/** @returns number of missing keys */
function checkKeys(ctx: CliContext, store: ProfileStore): number {
    const { output } = ctx;
    let missing = 0;

    output.section("SSH Keys");
    for (const profile of store.list()) {
        if (ctx.fs.exists(profile.sshKeyPath)) {
            output.success(`${profile.displayName} SSH key found`);
        } else {
            output.error(`${profile.displayName} SSH key not found: ${profile.sshKeyPath}`);
            missing++;
        }
    }
    output.line();
    return missing;
}

function checkSshConfig(ctx: CliContext, store: ProfileStore): boolean {
    const { output } = ctx;
    const verification = verifySshConfig(ctx.config.sshConfigFile, store);

    output.section("SSH Configuration");
    if (!verification.exists) {
        output.warn("SSH config file not found");
    } else if (!verification.complete) {
        output.warn(`SSH config is incomplete (missing hosts: ${verification.missingHosts.join(", ")})`);
    } else {
        output.success("SSH config is properly configured");
    }
    output.line();
    return verification.complete;
}

/** @returns number of failed connections */
function testConnections(ctx: CliContext, store: ProfileStore): number {
    const { output } = ctx;
    let failed = 0;

    output.section("GitHub Connections");
    for (const profile of store.list()) {
        output.info(`Testing ${profile.displayName} SSH connection to ${profile.sshHostAlias}...`);
        const probe = ctx.ssh.probe(profile.sshHostAlias);
        if (probe.authenticated) {
            output.success(`${profile.displayName} SSH connection successful`);
        } else {
            output.error(`${profile.displayName} SSH connection failed`);
            output.debug(`[SSH] ${probe.output}`);
            output.info("Add your public key to GitHub: https://github.com/settings/keys");
            failed++;
        }
    }
    output.line();
    return failed;
}

/**
 * `diagnose`: report configuration, keys, SSH config, connectivity and the
 * detected context. Exits 1 when any check fails.
 */
export async function diagnoseCommand(ctx: CliContext): Promise<number> {
    const { output } = ctx;
    const store = loadStoreOrEmpty(ctx);

    output.header("System Diagnostics");
    printConfiguration(ctx, store);

    const missingKeys = checkKeys(ctx, store);
    const sshConfigComplete = checkSshConfig(ctx, store);
    const failedConnections = testConnections(ctx, store);

    const resolved = resolveContext(ctx.cwd, store, { matchMode: ctx.config.matchMode });
    output.section("Current Context");
    output.field("Detected: ", resolved.profile.toUpperCase());
    output.field("Directory:", ctx.cwd);

    const git = ctx.createGit(ctx.cwd);
    if (git.isInsideRepository()) {
        output.line();
        showCurrentConfiguration(ctx, git);
    }

    return missingKeys === 0 && sshConfigComplete && failedConnections === 0 ? 0 : 1;
}
