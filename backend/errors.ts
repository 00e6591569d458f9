export type ComposeErrorCode =
    | "SERVICE_NOT_FOUND"
    | "SERVICE_NOT_RUNNING"
    | "CIRCULAR_DEPENDENCY"
    | "VOLUME_SOURCE_NOT_FOUND"
    | "ANONYMOUS_VOLUME_UNSUPPORTED"
    | "HOME_DIRECTORY_UNRESOLVABLE"
    | "RUNTIME_INVOCATION_FAILED"
    | "RUNTIME_TIMEOUT"
    | "CONFIG_LOAD_FAILED";

export class ComposeError extends Error {
    readonly code: ComposeErrorCode;

    constructor(code: ComposeErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class ServiceNotFoundError extends ComposeError {
    constructor(readonly service: string) {
        super("SERVICE_NOT_FOUND", `Service '${service}' not found`);
    }
}

export class ServiceNotRunningError extends ComposeError {
    constructor(readonly service: string) {
        super("SERVICE_NOT_RUNNING", `Service '${service}' is not running`);
    }
}

export class CircularDependencyError extends ComposeError {
    constructor(readonly service: string) {
        super("CIRCULAR_DEPENDENCY", `Circular dependency detected involving '${service}'`);
    }
}

export class VolumeSourceNotFoundError extends ComposeError {
    constructor(readonly original: string, readonly resolved: string) {
        super("VOLUME_SOURCE_NOT_FOUND", `Volume mount source path does not exist: ${original} (resolved to: ${resolved})`);
    }
}

export class AnonymousVolumeUnsupportedError extends ComposeError {
    constructor(readonly volume: string) {
        super("ANONYMOUS_VOLUME_UNSUPPORTED", `Anonymous volumes are not supported: ${volume}`);
    }
}

export class HomeDirectoryUnresolvableError extends ComposeError {
    constructor() {
        super("HOME_DIRECTORY_UNRESOLVABLE", "Could not find home directory (neither HOME nor USERPROFILE is set)");
    }
}

/**
 * The runtime could not be spawned (`exitCode` is null) or exited non-zero.
 */
export class RuntimeInvocationError extends ComposeError {
    constructor(
        readonly argv: string[],
        readonly exitCode: number | null,
        readonly stderr: string,
        message?: string,
    ) {
        super("RUNTIME_INVOCATION_FAILED", message ?? RuntimeInvocationError.describe(argv, exitCode, stderr));
    }

    private static describe(argv: string[], exitCode: number | null, stderr: string): string {
        const command = argv.join(" ");
        if (exitCode === null) {
            return `Failed to execute ${command}: ${stderr}`;
        }
        const detail = stderr.trim();
        return detail
            ? `${command} exited with code ${exitCode}: ${detail}`
            : `${command} exited with code ${exitCode}`;
    }
}

export class RuntimeTimeoutError extends ComposeError {
    constructor(readonly argv: string[], readonly timeoutMs: number) {
        super("RUNTIME_TIMEOUT", `${argv.join(" ")} did not finish within ${timeoutMs}ms`);
    }
}

export interface ConfigProblem {
    path: string;
    message: string;
}

export class ConfigLoadError extends ComposeError {
    constructor(readonly file: string, readonly problems: ConfigProblem[]) {
        super("CONFIG_LOAD_FAILED", ConfigLoadError.describe(file, problems));
    }

    private static describe(file: string, problems: ConfigProblem[]): string {
        const lines = problems.map((p) => (p.path ? `${p.path}: ${p.message}` : p.message));
        return `Failed to load ${file}:\n${lines.join("\n")}`;
    }
}
