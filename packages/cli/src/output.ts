/**
 * Terminal output for commands.
 *
 * Status lines carry ✓ / ⚠ / ✗ markers. Errors go to stderr, everything
 * else to stdout.
 */

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface OutputWriter {
    out(line: string): void;
    err(line: string): void;
}

export const consoleWriter: OutputWriter = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
};

export function parseLogLevel(value: string | undefined): LogLevel {
    const upper = value?.trim().toUpperCase();
    return LOG_LEVELS.find((level) => level === upper) ?? "INFO";
}

export class Output {
    private readonly writer: OutputWriter;
    private readonly threshold: number;

    constructor(writer: OutputWriter = consoleWriter, level: LogLevel = "INFO") {
        this.writer = writer;
        this.threshold = LOG_LEVELS.indexOf(level);
    }

    line(text: string = ""): void {
        this.writer.out(text);
    }

    debug(message: string): void {
        if (this.enabled("DEBUG")) {
            this.writer.out(`· ${message}`);
        }
    }

    info(message: string): void {
        if (this.enabled("INFO")) {
            this.writer.out(`  ${message}`);
        }
    }

    success(message: string): void {
        this.writer.out(`✓ ${message}`);
    }

    warn(message: string): void {
        if (this.enabled("WARN")) {
            this.writer.out(`⚠ ${message}`);
        }
    }

    error(message: string): void {
        this.writer.err(`✗ ${message}`);
    }

    header(title: string): void {
        this.writer.out("");
        this.writer.out(`━━━ ${title} ━━━`);
        this.writer.out("");
    }

    section(title: string): void {
        this.writer.out(title);
    }

    /** Indented `label value` line */
    field(label: string, value: string): void {
        this.writer.out(`  ${label} ${value}`);
    }

    private enabled(level: LogLevel): boolean {
        return LOG_LEVELS.indexOf(level) >= this.threshold;
    }
}
