import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { createDefaultProfiles, PathMatchMode } from "@gitswitch/core";
import { LogLevel, Output, parseLogLevel } from "./output";

export const CLI_NAME = "gitswitch";

export interface CliConfig {
    name: string;
    version: string;
    homeDir: string;
    /** key=value file holding the root folder and both identities */
    configFile: string;
    sshDir: string;
    sshConfigFile: string;
    /** Root folder to use when the config file does not set one (WORK_FOLDER) */
    defaultRootFolder?: string;
    /** How the working directory is compared with the work folder */
    matchMode: PathMatchMode;
    logLevel: LogLevel;
    trace: boolean;
}

const PackageManifestSchema = z.object({
    version: z.string(),
});

function readPackageVersion(): string {
    const manifestPath = path.join(__dirname, "..", "package.json");
    const parsed = PackageManifestSchema.safeParse(JSON.parse(fs.readFileSync(manifestPath, "utf-8")));
    return parsed.success ? parsed.data.version : "0.0.0";
}

function nonEmpty(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

export function createCliConfig(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): CliConfig {
    const sshDir = nonEmpty(env.GITSWITCH_SSH_DIR) ?? path.join(homeDir, ".ssh");

    return {
        name: CLI_NAME,
        version: readPackageVersion(),
        homeDir,
        configFile: nonEmpty(env.GITSWITCH_CONFIG_FILE) ?? path.join(homeDir, ".git-config-settings"),
        sshDir,
        sshConfigFile: path.join(sshDir, "config"),
        defaultRootFolder: nonEmpty(env.WORK_FOLDER),
        matchMode: env.GITSWITCH_MATCH_MODE === "segment" ? "segment" : "prefix",
        logLevel: parseLogLevel(env.LOG_LEVEL),
        trace: env.TRACE_MODE === "true",
    };
}

export function logConfigurationSummary(config: CliConfig, output: Output): void {
    output.debug(`[CONFIG] ${config.name} v${config.version}`);
    output.debug(`[CONFIG] Configuration file: ${config.configFile}`);
    output.debug(`[CONFIG] SSH directory: ${config.sshDir}`);
    output.debug(`[CONFIG] Default work folder: ${config.defaultRootFolder ?? "<not set>"}`);
    output.debug(`[CONFIG] Folder matching: ${config.matchMode}`);
    output.debug(`[CONFIG] Log level: ${config.logLevel}${config.trace ? " (git trace on)" : ""}`);
}

export function showVersion(config: CliConfig, output: Output): void {
    output.line(`Git SSH Multi-Account Manager`);
    output.line(`Version: ${config.version}`);
}

export function showHelpMessage(config: CliConfig, output: Output): void {
    const name = config.name;
    const profiles = createDefaultProfiles(config.sshDir);
    output.line(`
USAGE
  ${name} [OPTIONS] <COMMAND> [ARGUMENTS]
  ${name} --path <PATH> <COMMAND>

OPTIONS
  --path <PATH>    Override work folder path
  --trace, -x      Log every git command
  --help, -h       Show this help message
  --version, -v    Show version information

COMMANDS
  setup-config     Interactive configuration wizard
  init             Initialize SSH keys and configuration
  work             Configure for work account
  personal         Configure for personal account
  fix-remote       Fix/change remote URL
  setup <URL>      Clone repository with auto-configuration
  status           Show current git configuration
  diagnose         Run comprehensive diagnostics
  auto             Auto-detect and configure based on path (default)
  help             Show this help message

EXAMPLES
  # First-time setup
  ${name} setup-config
  ${name} init

  # Auto-configure based on location
  cd ~/projects/work && ${name} auto

  # Override work folder
  ${name} --path /custom/path auto

  # Clone with auto-configuration
  ${name} setup git@github.com:user/repo.git

FILES
  Configuration: ${config.configFile}
  SSH Config:    ${config.sshConfigFile}
  Work Key:      ${profiles.work.sshKeyPath}
  Personal Key:  ${profiles.personal.sshKeyPath}

ENVIRONMENT
  WORK_FOLDER            Default work folder when none is configured
  GITSWITCH_CONFIG_FILE  Alternative configuration file
  GITSWITCH_SSH_DIR      Alternative SSH directory
  GITSWITCH_MATCH_MODE   "segment" to match whole path components only
  LOG_LEVEL              DEBUG, INFO, WARN or ERROR
  TRACE_MODE             Set to "true" to log every git command
`);
}
