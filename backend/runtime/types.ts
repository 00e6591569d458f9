export interface ServiceSpec {
    name: string;
    image: string;
    ports: string[];            // advisory only, the runtime cannot publish ports
    volumes: string[];          // raw "host:container[:opts]" strings
    environment: string[];      // "KEY=VALUE"
    dependsOn: string[];
    command?: string[];
    workingDir?: string;
}

export interface VolumeSpec {
    name: string;
    driver: string;
}

export interface NetworkSpec {
    name: string;
    driver: string;
}

export interface ComposeConfig {
    version: string;
    services: Map<string, ServiceSpec>;
    volumes: Map<string, VolumeSpec>;
    networks: Map<string, NetworkSpec>;
}

export interface CompileProblem {
    key: string;
    path: string;        // e.g. "services.web.image"
    message: string;
}

export interface CompileResult {
    config: ComposeConfig;
    errors: CompileProblem[];
    warnings: string[];
}

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export type BoundedResult =
    | { timedOut: false; result: CommandResult }
    | { timedOut: true };

export interface RunRequest {
    name: string;
    image: string;
    volumes: string[];      // already resolved mount arguments
    environment: string[];
    workingDir?: string;
    command?: string[];
}

export interface ContainerListEntry {
    name: string;
    image: string;
    state: "running" | "stopped" | "unknown";
}

export type ServiceStatus = "not-created" | "running" | "stopped";

export interface ContainerRecord {
    serviceName: string;
    status: "running" | "stopped";
    containerId?: string;
}

export type StopOutcome = "stopped" | "already-absent" | "failed";

export type StopOrderMode = "declared" | "reverse-dependency";

export type ListFormat = "table" | "json";

export interface RuntimeCapabilities {
    runtimeName: string;
    runtimeVersion: string;
    available: boolean;
    supported: boolean;
    minimumVersion: string;
}
