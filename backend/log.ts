import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = [ "debug", "info", "warn", "error" ];

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && (LEVELS as string[]).includes(value);
}

function colorFor(level: LogLevel): (text: string) => string {
    switch (level) {
        case "debug":
            return chalk.gray;
        case "info":
            return chalk.cyan;
        case "warn":
            return chalk.yellow;
        case "error":
            return chalk.red;
    }
}

/**
 * Diagnostic logger. Writes to stderr so that it never interleaves with the
 * reporter's table output on stdout.
 */
export class Logger {
    private level: LogLevel;
    private sink: (line: string) => void;

    constructor(level: LogLevel = "warn", sink: (line: string) => void = (line) => process.stderr.write(line + "\n")) {
        this.level = level;
        this.sink = sink;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    debug(module: string, message: unknown): void {
        this.write("debug", module, message);
    }

    info(module: string, message: unknown): void {
        this.write("info", module, message);
    }

    warn(module: string, message: unknown): void {
        this.write("warn", module, message);
    }

    error(module: string, message: unknown): void {
        this.write("error", module, message);
    }

    private write(level: LogLevel, module: string, message: unknown): void {
        if (LEVELS.indexOf(level) < LEVELS.indexOf(this.level)) {
            return;
        }
        const text = message instanceof Error ? message.message : String(message);
        const timestamp = new Date().toISOString();
        this.sink(colorFor(level)(`${timestamp} [${module}] ${level.toUpperCase()}: ${text}`));
    }
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();

export const log = new Logger(isLogLevel(envLevel) ? envLevel : "warn");
