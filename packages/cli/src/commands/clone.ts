import * as path from "path";
import {
    classify,
    normalizeScheme,
    ReconciliationEngine,
    repositoryNameFromUrl,
    resolveContext,
    rewrite,
} from "@gitswitch/core";
import { CliContext, loadStore } from "../context";
import { printIdentity } from "./identity";

/**
 * `setup <url>`: clone with the alias of the profile the working directory
 * resolves to, then apply that profile's identity inside the clone.
 */
export async function cloneCommand(ctx: CliContext, args: string[]): Promise<number> {
    const { output } = ctx;
    const repoUrl = args[0]?.trim();
    if (!repoUrl) {
        output.error("Repository URL is required");
        output.info(`Usage: ${ctx.config.name} setup <repository-url>`);
        return 1;
    }

    const store = loadStore(ctx);
    const resolved = resolveContext(ctx.cwd, store, { matchMode: ctx.config.matchMode });
    const profile = store.requireConfigured(resolved.profile);

    const normalized = normalizeScheme(repoUrl);
    if (classify(normalized, store).kind === "unrecognized") {
        output.warn("Not a GitHub URL; cloning it unchanged");
    }
    const cloneUrl = rewrite(normalized, profile, store);

    output.info(`Cloning repository with ${profile.name.toUpperCase()} configuration...`);
    output.field("URL:", cloneUrl);
    output.line();

    ctx.cloneRepository(cloneUrl, ctx.cwd);

    const repoDir = path.join(ctx.cwd, repositoryNameFromUrl(cloneUrl));
    if (!ctx.fs.exists(repoDir)) {
        output.warn(`Cloned, but ${repoDir} was not found; run '${ctx.config.name} auto' inside the clone`);
        return 0;
    }

    const engine = new ReconciliationEngine(store, ctx.createGit(repoDir));
    printIdentity(ctx, engine.applyIdentity(profile.name));
    output.success("Repository cloned and configured");
    output.field("Location:", repoDir);
    return 0;
}
