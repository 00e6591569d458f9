import { log } from "./log.js";
import { ContainerRuntime } from "./runtime/runtime-adapter.js";
import { ContainerListParser, createListParser } from "./runtime/apple-container/list-parser.js";
import { ContainerListEntry, ServiceSpec, ServiceStatus } from "./runtime/types.js";

export interface ContainerDetails {
    identifier: string;
    image: string;
}

/**
 * Queries the runtime for its container roster. The runtime is the only
 * authority on what exists; nothing here is cached between calls.
 */
export class StatusInspector {
    private runtime: ContainerRuntime;
    private services: ReadonlyMap<string, ServiceSpec>;
    private parser: ContainerListParser;

    constructor(runtime: ContainerRuntime, services: ReadonlyMap<string, ServiceSpec>, parser: ContainerListParser = createListParser(runtime.listFormat)) {
        this.runtime = runtime;
        this.services = services;
        this.parser = parser;
    }

    /**
     * Names of configured services that have a container, running only or
     * including stopped ones.
     */
    async listContainers(includeStopped: boolean): Promise<string[]> {
        const entries = await this.listEntries(includeStopped);
        return entries
            .map((entry) => entry.name)
            .filter((name) => this.services.has(name));
    }

    async containerDetails(name: string): Promise<ContainerDetails> {
        const entries = await this.listEntries(true);
        const entry = entries.find((e) => e.name === name && e.image);
        if (entry) {
            return { identifier: entry.name,
                image: entry.image };
        }

        return {
            identifier: name,
            image: this.services.get(name)?.image ?? "unknown",
        };
    }

    async serviceStatuses(): Promise<Map<string, ServiceStatus>> {
        const all = new Set(await this.listContainers(true));
        const running = new Set(await this.listContainers(false));
        const result = new Map<string, ServiceStatus>();

        for (const name of this.services.keys()) {
            if (!all.has(name)) {
                result.set(name, "not-created");
            } else {
                result.set(name, running.has(name) ? "running" : "stopped");
            }
        }
        return result;
    }

    private async listEntries(includeStopped: boolean): Promise<ContainerListEntry[]> {
        const result = await this.runtime.list(includeStopped);
        if (result.exitCode !== 0) {
            log.warn("status", `container list exited with code ${result.exitCode}: ${result.stderr.trim()}`);
            return [];
        }
        return this.parser.parse(result.stdout);
    }
}
