import assert from "node:assert/strict";
import test from "node:test";
import { RuntimeTimeoutError } from "../../backend/errors.js";
import {
    detectCapabilities,
    isRuntimeAvailable,
    isSupportedVersion,
    readVersionToken
} from "../../backend/runtime/apple-container/capabilities.js";
import { failed, FakeRuntime } from "../fakes/fake-runtime.js";

test("readVersionToken finds the semver in runtime output", () => {
    assert.equal(readVersionToken("container CLI version 0.5.0 (build: release, commit: 1a2b3c4)"), "0.5.0");
    assert.equal(readVersionToken("v1.2.3-beta.1"), "1.2.3-beta.1");
    assert.equal(readVersionToken("no version here"), undefined);
});

test("isSupportedVersion compares against the minimum", () => {
    assert.equal(isSupportedVersion("0.5.0", "0.1.0"), true);
    assert.equal(isSupportedVersion("0.1.0", "0.1.0"), true);
    assert.equal(isSupportedVersion("0.0.9", "0.1.0"), false);
    assert.equal(isSupportedVersion("unknown", "0.1.0"), false);
    assert.equal(isSupportedVersion(undefined, "0.1.0"), false);
});

test("availability follows system status", async () => {
    const runtime = new FakeRuntime();
    assert.equal(await isRuntimeAvailable(runtime, 100), true);

    runtime.statusBehaviour = "down";
    assert.equal(await isRuntimeAvailable(runtime, 100), false);

    runtime.statusBehaviour = "missing";
    assert.equal(await isRuntimeAvailable(runtime, 100), false);

    runtime.statusBehaviour = "timeout";
    await assert.rejects(isRuntimeAvailable(runtime, 100), RuntimeTimeoutError);
});

test("detectCapabilities reports version and support", async () => {
    const runtime = new FakeRuntime();

    assert.deepEqual(await detectCapabilities(runtime, "0.1.0"), {
        runtimeName: "apple-container",
        runtimeVersion: "0.5.0",
        available: true,
        supported: true,
        minimumVersion: "0.1.0",
    });
    assert.equal((await detectCapabilities(runtime, "1.0.0")).supported, false);
});

test("detectCapabilities does not ask an unavailable runtime for its version", async () => {
    const runtime = new FakeRuntime();
    runtime.statusBehaviour = "missing";

    const capabilities = await detectCapabilities(runtime, "0.1.0");

    assert.equal(capabilities.available, false);
    assert.equal(capabilities.runtimeVersion, "unknown");
    assert.deepEqual(runtime.commands("--version"), []);
});

test("a failing version command leaves the version unknown", async () => {
    const runtime = new FakeRuntime();
    runtime.versionResult = failed("unrecognized option");

    const capabilities = await detectCapabilities(runtime, "0.1.0");

    assert.equal(capabilities.runtimeVersion, "unknown");
    assert.equal(capabilities.supported, false);
});
