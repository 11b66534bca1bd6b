import { ensureSshDirectory, ProfileStore, writeSshConfig } from "@gitswitch/core";
import { CliContext, loadStore } from "../context";
import { runSetupWizard } from "./setup-config";

const GITHUB_KEYS_URL = "https://github.com/settings/keys";

function generateMissingKeys(ctx: CliContext, store: ProfileStore): void {
    const { output, ssh } = ctx;

    const profiles = store.list().map(({ name }) => store.requireConfigured(name));

    for (const profile of profiles) {
        if (ctx.fs.exists(profile.sshKeyPath)) {
            output.info(`${profile.displayName} SSH key already exists at ${profile.sshKeyPath}`);
            continue;
        }
        output.info(`Generating ${profile.displayName} SSH key...`);
        ssh.generateKey(profile.sshKeyPath, profile.gitUserEmail);
        output.success(`${profile.displayName} SSH key generated successfully`);
    }
}

function addKeysToAgent(ctx: CliContext, store: ProfileStore): void {
    const { output, ssh } = ctx;

    for (const profile of store.list()) {
        if (ssh.addToAgent(profile.sshKeyPath)) {
            output.success(`${profile.displayName} key added to SSH agent`);
        } else {
            output.warn(`Could not add ${profile.displayName} key to SSH agent (may already be added)`);
        }
    }
}

function printNextSteps(ctx: CliContext, store: ProfileStore): void {
    const { output } = ctx;

    output.header("Next Steps");
    output.line("1. Add SSH keys to GitHub:");
    output.line();
    for (const profile of store.list()) {
        output.line(`${profile.displayName} Account:`);
        output.line(`   cat ${profile.sshKeyPath}.pub`);
        output.line(`   → Add to: ${GITHUB_KEYS_URL}`);
        output.line();
    }
    output.line("2. Test your setup:");
    output.line(`   ${ctx.config.name} diagnose`);
}

/**
 * `init`: make sure both accounts have a key pair and an SSH host alias.
 * Runs the configuration wizard first when nothing is configured yet.
 */
export async function initCommand(ctx: CliContext): Promise<number> {
    const { output, config } = ctx;

    if (!ctx.configFile.exists()) {
        output.warn("No configuration found");
        output.info("Running setup first...");
        output.line();
        if (!(await runSetupWizard(ctx))) {
            return 1;
        }
        output.line();
    }

    const store = loadStore(ctx);

    output.header("SSH Key Setup");
    if (ensureSshDirectory(config.sshDir)) {
        output.info("Created .ssh directory");
    }

    generateMissingKeys(ctx, store);
    addKeysToAgent(ctx, store);

    writeSshConfig(config.sshConfigFile, store);
    output.success(`SSH config created/updated at ${config.sshConfigFile}`);

    printNextSteps(ctx, store);
    return 0;
}
