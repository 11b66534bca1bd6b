import type { CliContext } from "../context";
import { cloneCommand } from "./clone";
import { diagnoseCommand } from "./diagnose";
import { fixRemoteCommand } from "./fix-remote";
import { applyProfileCommand, autoCommand } from "./identity";
import { initCommand } from "./init";
import { setupConfigCommand } from "./setup-config";
import { statusCommand } from "./status";

export type CommandHandler = (ctx: CliContext, args: string[]) => Promise<number>;

export interface CommandDefinition {
    name: string;
    aliases: string[];
    run: CommandHandler;
}

export const COMMANDS: CommandDefinition[] = [
    { name: "setup-config", aliases: ["config"], run: (ctx) => setupConfigCommand(ctx) },
    { name: "init", aliases: ["initialize"], run: (ctx) => initCommand(ctx) },
    { name: "work", aliases: [], run: (ctx) => applyProfileCommand(ctx, "work") },
    { name: "personal", aliases: [], run: (ctx) => applyProfileCommand(ctx, "personal") },
    { name: "fix-remote", aliases: ["fix"], run: (ctx) => fixRemoteCommand(ctx) },
    { name: "setup", aliases: ["clone"], run: cloneCommand },
    { name: "status", aliases: ["show"], run: (ctx) => statusCommand(ctx) },
    { name: "diagnose", aliases: ["test", "check"], run: (ctx) => diagnoseCommand(ctx) },
    { name: "auto", aliases: [], run: (ctx) => autoCommand(ctx) },
];

export function findCommand(name: string): CommandDefinition | undefined {
    return COMMANDS.find((command) => command.name === name || command.aliases.includes(name));
}
