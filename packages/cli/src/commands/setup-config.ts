import { ProfileStore, validateEmail, validateName, ValidationResult } from "@gitswitch/core";
import type { CliContext } from "../context";

function orNotSet(value: string): string {
    return value || "<not set>";
}

function acceptOrMessage(result: ValidationResult<string>): true | string {
    return result.ok ? true : result.error.message;
}

async function promptRootFolder(ctx: CliContext, store: ProfileStore): Promise<void> {
    const { output, prompter } = ctx;

    output.section("Work Folder");
    output.field("Current:", orNotSet(store.rootFolder));
    output.line();

    const answer = await prompter.input("Enter work folder path (or press Enter to keep current):", {
        validate: (value) => {
            if (!value.trim()) {
                return true;
            }
            const expanded = ctx.fs.expand(value);
            return ctx.fs.exists(expanded) ? true : `Path does not exist: ${expanded}`;
        },
    });

    if (answer.trim()) {
        const folder = store.setRootFolder(answer, ctx.fs);
        output.success(`Work folder updated: ${folder}`);
    }
    output.line();
}

async function promptIdentities(ctx: CliContext, store: ProfileStore): Promise<void> {
    const { output, prompter } = ctx;

    for (const profile of store.list()) {
        const label = profile.displayName.toLowerCase();
        output.section(`${profile.displayName} Account`);

        const nameAnswer = await prompter.input(`Enter your ${label} name:`, {
            default: profile.gitUserName || undefined,
            validate: (value) => acceptOrMessage(validateName(value)),
        });
        const emailAnswer = await prompter.input(`Enter your ${label} email:`, {
            default: profile.gitUserEmail || undefined,
            validate: (value) => acceptOrMessage(validateEmail(value)),
        });

        const name = validateName(nameAnswer);
        if (!name.ok) {
            throw name.error;
        }
        const email = validateEmail(emailAnswer);
        if (!email.ok) {
            throw email.error;
        }

        store.setIdentity(profile.name, { gitUserName: name.value, gitUserEmail: email.value });
        output.line();
    }
}

function printSummary(ctx: CliContext, store: ProfileStore): void {
    const { output } = ctx;

    output.header("Configuration Summary");
    for (const profile of store.list()) {
        output.line(`  ${profile.displayName}:`);
        if (profile.name === store.locationBound.name) {
            output.field("  Folder:", orNotSet(store.rootFolder));
        }
        output.field("  Name:", profile.gitUserName);
        output.field("  Email:", profile.gitUserEmail);
        output.line();
    }
}

/**
 * Interactive configuration wizard. Starts from the saved configuration,
 * if any, and saves only after confirmation.
 *
 * @returns whether the configuration was saved
 */
export async function runSetupWizard(ctx: CliContext): Promise<boolean> {
    const { output, prompter, configFile } = ctx;
    const store = configFile.load() ?? configFile.createEmpty();

    output.header("Interactive Configuration");
    await promptRootFolder(ctx, store);
    await promptIdentities(ctx, store);
    printSummary(ctx, store);

    if (!(await prompter.confirm("Save this configuration?", true))) {
        output.warn("Configuration not saved");
        return false;
    }

    configFile.save(store);
    output.success(`Configuration saved to ${configFile.path}`);
    output.success("Configuration complete!");
    output.info(`Next step: Run '${ctx.config.name} init'`);
    return true;
}

export async function setupConfigCommand(ctx: CliContext): Promise<number> {
    await runSetupWizard(ctx);
    return 0;
}
