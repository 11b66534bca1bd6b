import { Profile, ProfileName, ReconciliationEngine } from "@gitswitch/core";
import { CliContext, loadStore, requireRepository } from "../context";

export function printIdentity(ctx: CliContext, profile: Profile): void {
    const { output } = ctx;
    output.success(`${profile.displayName} account configured`);
    output.line();
    output.field("User: ", profile.gitUserName);
    output.field("Email:", profile.gitUserEmail);
    output.field("Host: ", profile.sshHostAlias);
}

/**
 * `work` / `personal`: apply a fixed profile to the current repository.
 */
export async function applyProfileCommand(ctx: CliContext, name: ProfileName): Promise<number> {
    const git = requireRepository(ctx);
    const engine = new ReconciliationEngine(loadStore(ctx), git);

    printIdentity(ctx, engine.applyIdentity(name));
    return 0;
}

/**
 * `auto`: apply the profile the working directory resolves to.
 */
export async function autoCommand(ctx: CliContext): Promise<number> {
    const { output } = ctx;
    const git = requireRepository(ctx);
    const engine = new ReconciliationEngine(loadStore(ctx), git);
    const resolved = engine.resolve(ctx.cwd, { matchMode: ctx.config.matchMode });

    output.header("Auto-Configuration");
    output.field("Context detected:", resolved.profile.toUpperCase());
    output.field("Directory:", ctx.cwd);
    output.line();

    printIdentity(ctx, engine.applyIdentity(resolved.profile));
    output.success("Configuration complete!");
    return 0;
}
