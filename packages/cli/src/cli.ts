import * as os from "os";
import { parseArgs } from "node:util";
import { GitSwitchError, InvalidPathError, logicalWorkingDirectory } from "@gitswitch/core";
import { findCommand } from "./commands";
import { createCliConfig, logConfigurationSummary, showHelpMessage, showVersion } from "./config";
import { CliServices, createCliContext } from "./context";
import { consoleWriter, Output, OutputWriter } from "./output";

export interface CliOptions {
    path?: string;
    trace: boolean;
    help: boolean;
    version: boolean;
    command: string;
    args: string[];
}

export interface RunCliOptions {
    env?: NodeJS.ProcessEnv;
    homeDir?: string;
    cwd?: string;
    writer?: OutputWriter;
    /** Replacements for the process-backed collaborators */
    services?: Partial<CliServices>;
}

export const DEFAULT_COMMAND = "auto";

export function parseCliArgs(argv: string[]): CliOptions {
    const { values, positionals } = parseArgs({
        args: argv,
        options: {
            path: {
                type: "string",
            },
            trace: {
                type: "boolean",
                short: "x",
                default: false,
            },
            help: {
                type: "boolean",
                short: "h",
                default: false,
            },
            version: {
                type: "boolean",
                short: "v",
                default: false,
            },
        },
        allowPositionals: true,
    });

    return {
        path: values.path,
        trace: values.trace ?? false,
        help: values.help ?? false,
        version: values.version ?? false,
        command: positionals[0] ?? DEFAULT_COMMAND,
        args: positionals.slice(1),
    };
}

export function reportError(output: Output, error: unknown): void {
    if (error instanceof GitSwitchError) {
        output.error(error.message);
        if (error.hint) {
            output.info(error.hint);
        }
        return;
    }
    output.error(errorMessage(error));
}

// Errors raised by Node internals are not `instanceof Error` in every realm
function errorMessage(error: unknown): string {
    if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
        return error.message;
    }
    return String(error);
}

/**
 * Parse `argv`, run one command and return the process exit code.
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
    const env = options.env ?? process.env;
    const baseConfig = createCliConfig(env, options.homeDir ?? os.homedir());
    const output = new Output(options.writer ?? consoleWriter, baseConfig.logLevel);

    let cliOptions: CliOptions;
    try {
        cliOptions = parseCliArgs(argv);
    } catch (error) {
        reportError(output, error);
        showHelpMessage(baseConfig, output);
        return 1;
    }

    const config = { ...baseConfig, trace: baseConfig.trace || cliOptions.trace };
    logConfigurationSummary(config, output);

    if (cliOptions.help || cliOptions.command === "help") {
        showHelpMessage(config, output);
        return 0;
    }
    if (cliOptions.version) {
        showVersion(config, output);
        return 0;
    }

    const command = findCommand(cliOptions.command);
    if (!command) {
        output.error(`Unknown command: ${cliOptions.command}`);
        showHelpMessage(config, output);
        return 1;
    }

    const ctx = createCliContext({
        config,
        output,
        env,
        cwd: options.cwd ?? logicalWorkingDirectory(env),
        services: options.services,
    });

    try {
        if (cliOptions.path !== undefined) {
            const expanded = ctx.fs.expand(cliOptions.path);
            if (!ctx.fs.exists(expanded)) {
                throw new InvalidPathError(expanded || cliOptions.path);
            }
            ctx.overridePath = expanded;
        }

        ctx.checkDependencies();
        return await command.run(ctx, cliOptions.args);
    } catch (error) {
        reportError(output, error);
        return 1;
    }
}
