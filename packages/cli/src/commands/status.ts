import { DEFAULT_REMOTE, GitAccessor, IDENTITY_CONFIG_KEYS } from "@gitswitch/core";
import { CliContext, requireRepository } from "../context";

export function showCurrentConfiguration(ctx: CliContext, git: GitAccessor): void {
    const { output } = ctx;
    const remoteUrl = git.getRemoteUrl(DEFAULT_REMOTE);

    output.header("Current Git Configuration");
    output.section("User");
    output.field("Name: ", git.getConfig(IDENTITY_CONFIG_KEYS.userName) ?? "Not set");
    output.field("Email:", git.getConfig(IDENTITY_CONFIG_KEYS.userEmail) ?? "Not set");

    if (remoteUrl) {
        output.section("Remote");
        output.field("URL:", remoteUrl);
    }

    output.section("SSH");
    output.field("Command:", git.getConfig(IDENTITY_CONFIG_KEYS.sshCommand) ?? "default");
}

/**
 * `status`: print the identity settings of the current repository.
 */
export async function statusCommand(ctx: CliContext): Promise<number> {
    showCurrentConfiguration(ctx, requireRepository(ctx));
    return 0;
}
