import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_SETTINGS, EngineSettings } from "../../backend/settings.js";
import { ComposeConfig, ServiceSpec, VolumeSpec } from "../../backend/runtime/types.js";

export type ServiceInput = Pick<ServiceSpec, "name" | "image"> & Partial<ServiceSpec>;

export function service(input: ServiceInput): ServiceSpec {
    return {
        ports: [],
        volumes: [],
        environment: [],
        dependsOn: [],
        ...input,
    };
}

export function makeConfig(services: ServiceInput[], namedVolumes: string[] = []): ComposeConfig {
    return {
        version: "1.0",
        services: new Map(services.map((s): [ string, ServiceSpec ] => [ s.name, service(s) ])),
        volumes: new Map(namedVolumes.map((name): [ string, VolumeSpec ] => [ name, { name,
            driver: "" } ])),
        networks: new Map(),
    };
}

export function makeTempDir(prefix = "container-compose-test-"): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true,
        force: true });
}

export function testSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
    return {
        ...DEFAULT_SETTINGS,
        stopTimeoutMs: 50,
        killRetryDelayMs: 0,
        ...overrides,
    };
}
