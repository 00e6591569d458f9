import assert from "node:assert/strict";
import test from "node:test";
import { DEFAULT_SETTINGS, loadSettings } from "../../backend/settings.js";

test("defaults apply when nothing is set", () => {
    assert.deepEqual(loadSettings({ HOME: "/home/dev" }), {
        ...DEFAULT_SETTINGS,
        homeDir: "/home/dev",
    });
    assert.equal(DEFAULT_SETTINGS.stopTimeoutMs, 10_000);
    assert.equal(DEFAULT_SETTINGS.killRetryDelayMs, 500);
});

test("USERPROFILE is used when HOME is not set", () => {
    assert.equal(loadSettings({ USERPROFILE: "C:\\Users\\dev" }).homeDir, "C:\\Users\\dev");
    assert.equal(loadSettings({}).homeDir, undefined);
    assert.equal(loadSettings({ HOME: "" }).homeDir, undefined);
});

test("environment variables override the defaults", () => {
    const settings = loadSettings({
        CONTAINER_COMPOSE_RUNTIME: "/opt/bin/container",
        CONTAINER_COMPOSE_STOP_TIMEOUT_MS: "2500",
        CONTAINER_COMPOSE_KILL_RETRY_DELAY_MS: "0",
        CONTAINER_COMPOSE_STOP_ORDER: "reverse-dependency",
        CONTAINER_COMPOSE_LIST_FORMAT: "json",
    });

    assert.equal(settings.runtimeBinary, "/opt/bin/container");
    assert.equal(settings.stopTimeoutMs, 2500);
    assert.equal(settings.killRetryDelayMs, 0);
    assert.equal(settings.stopOrder, "reverse-dependency");
    assert.equal(settings.listFormat, "json");
});

test("invalid values are rejected", () => {
    assert.throws(() => loadSettings({ CONTAINER_COMPOSE_STOP_TIMEOUT_MS: "soon" }), {
        message: "CONTAINER_COMPOSE_STOP_TIMEOUT_MS must be an integer >= 1, got \"soon\"",
    });
    assert.throws(() => loadSettings({ CONTAINER_COMPOSE_KILL_RETRY_DELAY_MS: "-1" }), {
        message: "CONTAINER_COMPOSE_KILL_RETRY_DELAY_MS must be an integer >= 0, got \"-1\"",
    });
    assert.throws(() => loadSettings({ CONTAINER_COMPOSE_STOP_ORDER: "random" }), {
        message: "CONTAINER_COMPOSE_STOP_ORDER must be one of declared, reverse-dependency, got \"random\"",
    });
});

test("a zero stop timeout is rejected while a zero kill delay is allowed", () => {
    assert.throws(() => loadSettings({ CONTAINER_COMPOSE_STOP_TIMEOUT_MS: "0" }), {
        message: "CONTAINER_COMPOSE_STOP_TIMEOUT_MS must be an integer >= 1, got \"0\"",
    });
    assert.equal(loadSettings({ CONTAINER_COMPOSE_KILL_RETRY_DELAY_MS: "0" }).killRetryDelayMs, 0);
});
