import type { ListFormat, StopOrderMode } from "./runtime/types.js";

export interface EngineSettings {
    runtimeBinary: string;
    stopTimeoutMs: number;
    killRetryDelayMs: number;
    stopOrder: StopOrderMode;
    listFormat: ListFormat;
    homeDir?: string;
    minimumRuntimeVersion: string;
}

export const DEFAULT_SETTINGS: EngineSettings = {
    runtimeBinary: "container",
    stopTimeoutMs: 10_000,
    killRetryDelayMs: 500,
    stopOrder: "declared",
    listFormat: "table",
    minimumRuntimeVersion: "0.1.0",
};

function readInteger(env: NodeJS.ProcessEnv, key: string, fallback: number, minimum: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < minimum) {
        throw new Error(`${key} must be an integer >= ${minimum}, got "${raw}"`);
    }
    return value;
}

function readChoice<T extends string>(env: NodeJS.ProcessEnv, key: string, choices: readonly T[], fallback: T): T {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") {
        return fallback;
    }
    const match = choices.find((choice) => choice === raw.trim());
    if (!match) {
        throw new Error(`${key} must be one of ${choices.join(", ")}, got "${raw}"`);
    }
    return match;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): EngineSettings {
    const home = env.HOME || env.USERPROFILE;

    return {
        runtimeBinary: env.CONTAINER_COMPOSE_RUNTIME?.trim() || DEFAULT_SETTINGS.runtimeBinary,
        stopTimeoutMs: readInteger(env, "CONTAINER_COMPOSE_STOP_TIMEOUT_MS", DEFAULT_SETTINGS.stopTimeoutMs, 1),
        killRetryDelayMs: readInteger(env, "CONTAINER_COMPOSE_KILL_RETRY_DELAY_MS", DEFAULT_SETTINGS.killRetryDelayMs, 0),
        stopOrder: readChoice(env, "CONTAINER_COMPOSE_STOP_ORDER", [ "declared", "reverse-dependency" ] as const, DEFAULT_SETTINGS.stopOrder),
        listFormat: readChoice(env, "CONTAINER_COMPOSE_LIST_FORMAT", [ "table", "json" ] as const, DEFAULT_SETTINGS.listFormat),
        homeDir: home || undefined,
        minimumRuntimeVersion: DEFAULT_SETTINGS.minimumRuntimeVersion,
    };
}
