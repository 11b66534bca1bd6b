import { ChooseProfile, describeBinding, ReconciliationEngine } from "@gitswitch/core";
import { CliContext, loadStore } from "../context";
import { printIdentity } from "./identity";

/**
 * `fix-remote`: point `origin` at the alias of the account the user picks
 * and apply that account's identity.
 */
export async function fixRemoteCommand(ctx: CliContext): Promise<number> {
    const { output, prompter } = ctx;
    const store = loadStore(ctx);
    const engine = new ReconciliationEngine(store, ctx.createGit(ctx.cwd));
    const remote = engine.readRemote();

    output.header("Remote URL Configuration");
    output.field("Current:", remote.url);
    output.field("Status: ", describeBinding(remote.binding, store));
    output.line();

    const chooseProfile: ChooseProfile = async ({ binding, profiles }) => {
        if (binding.kind === "bound" && !(await prompter.confirm("Change the account type?", false))) {
            return binding.profile;
        }
        return prompter.selectProfile("Select account type:", profiles);
    };

    const result = await engine.reconcile(remote.url, chooseProfile);

    switch (result.status) {
        case "left-alone":
            output.success("Remote URL is not a GitHub account remote; nothing to change");
            break;
        case "unchanged":
            output.info("Configuration unchanged");
            if (result.profileApplied) {
                output.info(`To re-apply the identity, run: ${ctx.config.name} ${result.profileApplied}`);
            }
            break;
        case "rebound":
            output.header("Applying Configuration");
            if (result.newUrl !== result.oldUrl) {
                output.success("Remote URL updated");
                output.field("URL:", result.newUrl);
            }
            if (result.profileApplied) {
                printIdentity(ctx, store.get(result.profileApplied));
            }
            break;
    }
    return 0;
}
