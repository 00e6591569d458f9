import { compareVersions, validate } from "compare-versions";
import { RuntimeInvocationError, RuntimeTimeoutError } from "../../errors.js";
import { ContainerRuntime } from "../runtime-adapter.js";
import { BoundedResult, RuntimeCapabilities } from "../types.js";

const STATUS_TIMEOUT_MS = 5_000;

const VERSION_TOKEN_REGEX = /v?(\d+\.\d+\.\d+(?:[-+][0-9A-Za-z.-]+)?)/;

/**
 * Pulls the first semver-looking token out of `container --version` output,
 * e.g. "container CLI version 0.5.0 (build: release)" gives "0.5.0".
 */
export function readVersionToken(output: string): string | undefined {
    const match = output.match(VERSION_TOKEN_REGEX);
    return match?.[1];
}

export function isSupportedVersion(version: string | undefined, minimum: string): boolean {
    if (!version || !validate(version)) {
        return false;
    }
    return compareVersions(version, minimum) >= 0;
}

function spawnFailed(e: unknown): boolean {
    return e instanceof RuntimeInvocationError && e.exitCode === null;
}

/**
 * A runtime binary that cannot be spawned counts as unavailable; a hung
 * `system status` is an error.
 */
export async function isRuntimeAvailable(runtime: ContainerRuntime, timeoutMs = STATUS_TIMEOUT_MS): Promise<boolean> {
    let status: BoundedResult;
    try {
        status = await runtime.systemStatus(timeoutMs);
    } catch (e) {
        if (spawnFailed(e)) {
            return false;
        }
        throw e;
    }
    if (status.timedOut) {
        throw new RuntimeTimeoutError([ "system", "status" ], timeoutMs);
    }
    return status.result.exitCode === 0;
}

export async function detectCapabilities(runtime: ContainerRuntime, minimumVersion: string, timeoutMs = STATUS_TIMEOUT_MS): Promise<RuntimeCapabilities> {
    const available = await isRuntimeAvailable(runtime, timeoutMs);

    let runtimeVersion = "unknown";
    if (available) {
        const versionResult = await runtime.version();
        if (versionResult.exitCode === 0) {
            runtimeVersion = readVersionToken(versionResult.stdout) ?? versionResult.stdout.trim();
        }
    }

    return {
        runtimeName: "apple-container",
        runtimeVersion,
        available,
        supported: isSupportedVersion(runtimeVersion, minimumVersion),
        minimumVersion,
    };
}
