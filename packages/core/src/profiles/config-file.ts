/**
 * Persistence of the profile store as a line-oriented key=value file
 * (~/.git-config-settings by default).
 *
 * The file is sourceable by a shell: two comment lines followed by one
 * `KEY=value` line per non-empty field, values quoted by `quoteShellValue`.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { createNodeFilesystem, FilesystemProbe } from '../system/filesystem';
import { createDefaultProfiles, ProfileStore } from './profile-store';
import { parseShellWord, quoteShellValue } from './shell-escape';

export const CONFIG_KEYS = [
  'WORK_FOLDER',
  'WORK_NAME',
  'WORK_EMAIL',
  'PERSONAL_NAME',
  'PERSONAL_EMAIL',
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

/**
 * Parsed configuration record. Unknown keys are stripped, absent keys stay
 * absent.
 */
export const ConfigRecordSchema = z.object({
  WORK_FOLDER: z.string().optional(),
  WORK_NAME: z.string().optional(),
  WORK_EMAIL: z.string().optional(),
  PERSONAL_NAME: z.string().optional(),
  PERSONAL_EMAIL: z.string().optional(),
});

export type ConfigRecord = z.infer<typeof ConfigRecordSchema>;

const ASSIGNMENT = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Parse configuration file text. Comment lines, blank lines and keys other
 * than CONFIG_KEYS are ignored; empty values count as unset.
 */
export function parseConfigRecord(text: string): ConfigRecord {
  const raw: Record<string, string> = {};

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const match = ASSIGNMENT.exec(trimmed);
    if (!match) {
      continue;
    }

    const value = parseShellWord(match[2]);
    if (value === null) {
      console.warn(`[CONFIG] Ignoring malformed value for ${match[1]}`);
      continue;
    }
    if (value !== '') {
      raw[match[1]] = value;
    }
  }

  return ConfigRecordSchema.parse(raw);
}

export function serializeConfigRecord(record: ConfigRecord, generatedAt: Date = new Date()): string {
  const lines = [
    '# Git SSH Configuration Settings',
    `# Generated: ${formatTimestamp(generatedAt)}`,
  ];

  for (const key of CONFIG_KEYS) {
    const value = record[key];
    if (value) {
      lines.push(`${key}=${quoteShellValue(value)}`);
    }
  }

  return lines.join('\n') + '\n';
}

export function storeToRecord(store: ProfileStore): ConfigRecord {
  const work = store.get('work');
  const personal = store.get('personal');
  const entries: [ConfigKey, string][] = [
    ['WORK_FOLDER', store.rootFolder],
    ['WORK_NAME', work.gitUserName],
    ['WORK_EMAIL', work.gitUserEmail],
    ['PERSONAL_NAME', personal.gitUserName],
    ['PERSONAL_EMAIL', personal.gitUserEmail],
  ];

  const record: ConfigRecord = {};
  for (const [key, value] of entries) {
    if (value) {
      record[key] = value;
    }
  }
  return record;
}

export interface ProfileConfigFileOptions {
  /** Directory holding the per-profile SSH keys */
  sshDir: string;
  /** Root folder used when the file does not set WORK_FOLDER */
  defaultRootFolder?: string;
  /** Expands `~` and `$VAR` in the loaded root folder. Default: the process environment */
  probe?: FilesystemProbe;
}

/**
 * Build a store from a parsed record. The root folder is expanded the way a
 * shell sourcing the file would, but its existence is not checked.
 */
export function recordToStore(record: ConfigRecord, options: ProfileConfigFileOptions): ProfileStore {
  const probe = options.probe ?? createNodeFilesystem();
  const rootFolder = record.WORK_FOLDER ?? options.defaultRootFolder ?? '';
  return new ProfileStore({
    profiles: createDefaultProfiles(options.sshDir, {
      work: { gitUserName: record.WORK_NAME, gitUserEmail: record.WORK_EMAIL },
      personal: { gitUserName: record.PERSONAL_NAME, gitUserEmail: record.PERSONAL_EMAIL },
    }),
    rootFolder: probe.expand(rootFolder),
  });
}

/**
 * Reads and writes the profile store at a fixed path.
 *
 * @example
 * const file = new ProfileConfigFile('/home/u/.git-config-settings', { sshDir: '/home/u/.ssh' });
 * const store = file.load(); // null when the file does not exist
 */
export class ProfileConfigFile {
  private readonly filePath: string;
  private readonly options: ProfileConfigFileOptions;

  constructor(filePath: string, options: ProfileConfigFileOptions) {
    this.filePath = filePath;
    this.options = options;
  }

  get path(): string {
    return this.filePath;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * Load the store. Returns null if the file is absent (not configured).
   */
  load(): ProfileStore | null {
    if (!this.exists()) {
      return null;
    }
    const text = fs.readFileSync(this.filePath, 'utf-8');
    return recordToStore(parseConfigRecord(text), this.options);
  }

  /**
   * Store with default profiles and no identities, for a first-time setup.
   */
  createEmpty(): ProfileStore {
    return recordToStore({}, this.options);
  }

  save(store: ProfileStore, generatedAt: Date = new Date()): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    fs.writeFileSync(this.filePath, serializeConfigRecord(storeToRecord(store), generatedAt), {
      encoding: 'utf-8',
      mode: 0o600,
    });
    // writeFileSync only applies `mode` when it creates the file
    fs.chmodSync(this.filePath, 0o600);
  }
}
