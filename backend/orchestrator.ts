import { log } from "./log.js";
import { DependencyGraph, resolveStartOrder, resolveStopOrder } from "./dependency-resolver.js";
import { RuntimeInvocationError, ServiceNotFoundError, ServiceNotRunningError } from "./errors.js";
import { Reporter, TableRow } from "./reporter.js";
import { EngineSettings } from "./settings.js";
import { StatusInspector } from "./status-inspector.js";
import { VolumeResolver } from "./volume-resolver.js";
import { ContainerRuntime } from "./runtime/runtime-adapter.js";
import { isLocalOnlyImageReference } from "./runtime/apple-container/adapter.js";
import { CommandResult, ComposeConfig, ContainerRecord, ServiceSpec, StopOutcome } from "./runtime/types.js";

const ABSENT_PATTERN = /no such container|not found/i;

export function isAbsentError(stderr: string): boolean {
    return ABSENT_PATTERN.test(stderr);
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(resolve, ms);
    });
}

export interface UpOptions {
    // stop and remove existing containers before running them again
    forceRecreate?: boolean;
}

export interface OrchestratorOptions {
    config: ComposeConfig;
    runtime: ContainerRuntime;
    reporter: Reporter;
    settings: EngineSettings;
    cwd: string;
    inspector?: StatusInspector;
}

/**
 * Drives the runtime through start and stop sequences, one service at a
 * time. Start is fail-fast; stop is fail-soft per service.
 */
export class LifecycleOrchestrator {
    private config: ComposeConfig;
    private runtime: ContainerRuntime;
    private reporter: Reporter;
    private settings: EngineSettings;
    private inspector: StatusInspector;
    private volumes: VolumeResolver;

    // Local cache for this process only. `ps` never reads it.
    private records: Map<string, ContainerRecord> = new Map();

    constructor(options: OrchestratorOptions) {
        this.config = options.config;
        this.runtime = options.runtime;
        this.reporter = options.reporter;
        this.settings = options.settings;
        this.inspector = options.inspector ?? new StatusInspector(options.runtime, options.config.services);
        this.volumes = new VolumeResolver(options.config.volumes.keys(), options.cwd, options.settings.homeDir);
    }

    getRecord(service: string): ContainerRecord | undefined {
        return this.records.get(service);
    }

    /**
     * Starts every service, or the given ones plus their dependencies, in
     * dependency order. Returns the number of services actually started.
     */
    async up(targets?: string[], options: UpOptions = {}): Promise<number> {
        this.reporter.info("Starting container-compose services");

        const initialized = this.volumes.ensureNamedVolumes();
        if (initialized.length > 0) {
            log.info("up", `Initialized ${initialized.length} named volume(s)`);
        }

        const order = resolveStartOrder(this.dependencyGraph(), targets ?? this.config.services.keys());
        const running = new Set(await this.inspector.listContainers(false));
        const existing = options.forceRecreate ? new Set(await this.inspector.listContainers(true)) : new Set<string>();

        let started = 0;
        for (const name of order) {
            const service = this.requireService(name);
            if (existing.has(name)) {
                await this.recreate(name);
            } else if (this.isRunning(name, running)) {
                this.reporter.warning(`${name} already running`);
                continue;
            }
            await this.runService(service);
            started++;
        }

        this.reporter.success(`Started ${started} service(s)`);
        return started;
    }

    /**
     * Like `up`, but restarts existing stopped containers instead of
     * creating new ones.
     */
    async start(target?: string): Promise<number> {
        const order = resolveStartOrder(this.dependencyGraph(), target ? [ target ] : this.config.services.keys());
        const statuses = await this.inspector.serviceStatuses();

        this.volumes.ensureNamedVolumes();

        let started = 0;
        for (const name of order) {
            const service = this.requireService(name);
            const status = statuses.get(name) ?? "not-created";

            if (status === "running" || this.records.get(name)?.status === "running") {
                this.reporter.warning(`${name} already running`);
                continue;
            }

            if (status === "stopped") {
                const result = await this.runtime.start(name);
                if (result.exitCode !== 0) {
                    throw new RuntimeInvocationError([ "start", name ], result.exitCode, result.stderr,
                        `Failed to start container '${name}': ${result.stderr.trim()}`);
                }
                this.records.set(name, { serviceName: name,
                    status: "running",
                    containerId: this.records.get(name)?.containerId ?? name });
                this.reporter.success(`${name} started`);
            } else {
                await this.runService(service);
            }
            started++;
        }

        this.reporter.success(`Started ${started} service(s)`);
        return started;
    }

    /**
     * Stops and removes every existing container. Failures are reported and
     * the loop carries on. With `removeVolumes`, named-volume directories are
     * deleted afterwards.
     */
    async down(removeVolumes = false): Promise<Map<string, StopOutcome>> {
        this.reporter.info("Stopping container-compose services");

        const existing = new Set(await this.inspector.listContainers(true));
        const outcomes = new Map<string, StopOutcome>();

        if (existing.size === 0) {
            this.reporter.info("No containers to stop");
            this.removeVolumesIf(removeVolumes);
            return outcomes;
        }

        for (const name of resolveStopOrder(this.dependencyGraph(), existing, this.settings.stopOrder)) {
            const outcome = await this.stopContainer(name, true);
            if (outcome !== "failed") {
                this.records.delete(name);
            }
            outcomes.set(name, outcome);
        }

        this.reporter.success(`Processed ${existing.size} service(s)`);
        this.removeVolumesIf(removeVolumes);
        return outcomes;
    }

    /**
     * Stops running containers without removing them.
     */
    async stop(target?: string): Promise<Map<string, StopOutcome>> {
        if (target !== undefined) {
            this.requireService(target);
        }

        const running = new Set((await this.inspector.listContainers(false))
            .filter((name) => target === undefined || name === target));
        const outcomes = new Map<string, StopOutcome>();

        if (running.size === 0) {
            this.reporter.info("No running containers to stop");
            return outcomes;
        }

        for (const name of resolveStopOrder(this.dependencyGraph(), running, this.settings.stopOrder)) {
            const outcome = await this.stopContainer(name, false);
            if (outcome === "stopped") {
                const previous = this.records.get(name);
                this.records.set(name, { serviceName: name,
                    status: "stopped",
                    containerId: previous?.containerId });
            } else if (outcome === "already-absent") {
                this.records.delete(name);
            }
            outcomes.set(name, outcome);
        }
        return outcomes;
    }

    async restart(target?: string): Promise<void> {
        await this.stop(target);
        await this.start(target);
    }

    async ps(): Promise<TableRow[]> {
        const statuses = await this.inspector.serviceStatuses();
        const rows: TableRow[] = [];

        for (const [ name, service ] of this.config.services) {
            const status = statuses.get(name) ?? "not-created";
            let row: TableRow;
            if (status === "not-created") {
                row = { service: name,
                    status,
                    identifier: "N/A",
                    image: service.image };
            } else {
                const details = await this.inspector.containerDetails(name);
                row = { service: name,
                    status,
                    identifier: details.identifier,
                    image: details.image };
            }
            this.reporter.tableRow(row);
            rows.push(row);
        }
        return rows;
    }

    async exec(service: string, command: string[]): Promise<void> {
        this.requireService(service);
        const tokens = command.length > 0 ? command : [ "sh" ];

        const exitCode = await this.runtime.exec(service, tokens);
        if (exitCode !== 0) {
            throw new RuntimeInvocationError([ "exec", service, ...tokens ], exitCode, "",
                `Command failed in container '${service}' with exit code: ${exitCode}`);
        }
    }

    async logs(service: string, follow: boolean): Promise<void> {
        this.requireService(service);

        let identifier = this.records.get(service)?.containerId;
        if (!identifier) {
            const existing = await this.inspector.listContainers(true);
            if (!existing.includes(service)) {
                throw new ServiceNotRunningError(service);
            }
            identifier = (await this.inspector.containerDetails(service)).identifier;
        }

        const exitCode = await this.runtime.logs(identifier, follow);
        if (exitCode !== 0) {
            throw new RuntimeInvocationError([ "logs", identifier ], exitCode, "",
                `Failed to get logs for service '${service}'`);
        }
    }

    async pull(target?: string): Promise<void> {
        const services = target !== undefined
            ? [ this.requireService(target) ]
            : [ ...this.config.services.values() ];

        for (const service of services) {
            this.reporter.info(`Pulling image for service '${service.name}'`);

            if (isLocalOnlyImageReference(service.image)) {
                this.reporter.info(`Skipping local image ${service.image}`);
                continue;
            }

            const result = await this.runtime.pull(service.image);
            if (result.exitCode !== 0) {
                throw new RuntimeInvocationError([ "images", "pull", service.image ], result.exitCode, result.stderr,
                    `Failed to pull image '${service.image}': ${result.stderr.trim()}`);
            }
            this.reporter.success(`Successfully pulled: ${service.image}`);
        }

        this.reporter.success("All images pulled successfully");
    }

    private async recreate(name: string): Promise<void> {
        const outcome = await this.stopContainer(name, true);
        if (outcome === "failed") {
            throw new RuntimeInvocationError([ "rm", name ], 1, "", `Failed to recreate container '${name}'`);
        }
        this.records.delete(name);
    }

    private async runService(service: ServiceSpec): Promise<void> {
        if (service.ports.length > 0) {
            this.reporter.warning(`${service.name}: port mappings are not supported by the container runtime, ignoring ${service.ports.join(", ")}`);
        }

        const volumes = service.volumes.map((raw) => {
            const resolved = this.volumes.resolve(raw);
            for (const warning of resolved.warnings) {
                this.reporter.warning(warning);
            }
            return resolved.argument;
        });

        const result = await this.runtime.run({
            name: service.name,
            image: service.image,
            volumes,
            environment: service.environment,
            workingDir: service.workingDir,
            command: service.command,
        });

        if (result.exitCode !== 0) {
            throw new RuntimeInvocationError([ "run", service.name ], result.exitCode, result.stderr,
                `Failed to start container '${service.name}': ${result.stderr.trim()}`);
        }

        const containerId = result.stdout.trim() || service.name;
        this.records.set(service.name, { serviceName: service.name,
            status: "running",
            containerId });
        this.reporter.success(`${service.name} started (${containerId})`);
    }

    /**
     * Graceful stop bounded by stopTimeoutMs, then kill, then one kill retry.
     * Removal after a successful stop is best effort.
     */
    private async stopContainer(name: string, removeAfter: boolean): Promise<StopOutcome> {
        const graceful = await this.runtime.stop(name, this.settings.stopTimeoutMs);

        let result: CommandResult;
        if (graceful.timedOut) {
            log.debug("stop", `${name} did not stop within ${this.settings.stopTimeoutMs}ms`);
            result = await this.killWithRetry(name);
        } else if (graceful.result.exitCode !== 0 && !isAbsentError(graceful.result.stderr)) {
            result = await this.killWithRetry(name);
        } else {
            result = graceful.result;
        }

        if (result.exitCode === 0) {
            if (removeAfter) {
                await this.removeQuietly(name);
            }
            this.reporter.success(`${name} stopped`);
            return "stopped";
        }

        if (isAbsentError(result.stderr)) {
            this.reporter.info(`${name} not found`);
            return "already-absent";
        }

        this.reporter.warning(`${name} failed to stop (tried stop and kill)`);
        return "failed";
    }

    private async killWithRetry(name: string): Promise<CommandResult> {
        const first = await this.runtime.kill(name);
        if (first.exitCode === 0 || isAbsentError(first.stderr)) {
            return first;
        }

        log.debug("stop", `kill ${name} failed, retrying in ${this.settings.killRetryDelayMs}ms`);
        await sleep(this.settings.killRetryDelayMs);
        return this.runtime.kill(name);
    }

    private async removeQuietly(name: string): Promise<void> {
        try {
            const result = await this.runtime.remove(name);
            if (result.exitCode !== 0) {
                log.debug("stop", `rm ${name} exited with code ${result.exitCode}: ${result.stderr.trim()}`);
            }
        } catch (e) {
            log.debug("stop", e);
        }
    }

    private removeVolumesIf(enabled: boolean): void {
        if (!enabled) {
            return;
        }
        for (const dir of this.volumes.removeNamedVolumes()) {
            this.reporter.info(`Removed volume directory ${dir}`);
        }
    }

    private isRunning(name: string, runtimeRunning: ReadonlySet<string>): boolean {
        return this.records.get(name)?.status === "running" || runtimeRunning.has(name);
    }

    private requireService(name: string): ServiceSpec {
        const service = this.config.services.get(name);
        if (!service) {
            throw new ServiceNotFoundError(name);
        }
        return service;
    }

    private dependencyGraph(): DependencyGraph {
        const graph = new Map<string, string[]>();
        for (const [ name, service ] of this.config.services) {
            graph.set(name, service.dependsOn);
        }
        return graph;
    }
}
