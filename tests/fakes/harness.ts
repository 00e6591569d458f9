import { LifecycleOrchestrator } from "../../backend/orchestrator.js";
import { EngineSettings } from "../../backend/settings.js";
import { ComposeConfig } from "../../backend/runtime/types.js";
import { FakeRuntime } from "./fake-runtime.js";
import { makeTempDir, removeDir, testSettings } from "./fixtures.js";
import { RecordingReporter } from "./recording-reporter.js";

export interface Harness {
    runtime: FakeRuntime;
    reporter: RecordingReporter;
    orchestrator: LifecycleOrchestrator;
    cwd: string;
    home: string;
    cleanup(): void;
}

export function createHarness(config: ComposeConfig, overrides: Partial<EngineSettings> = {}): Harness {
    const cwd = makeTempDir("cc-proj-");
    const home = makeTempDir("cc-home-");
    const runtime = new FakeRuntime();
    const reporter = new RecordingReporter();
    const orchestrator = new LifecycleOrchestrator({
        config,
        runtime,
        reporter,
        settings: testSettings({ homeDir: home,
            ...overrides }),
        cwd,
    });

    return {
        runtime,
        reporter,
        orchestrator,
        cwd,
        home,
        cleanup: () => {
            removeDir(cwd);
            removeDir(home);
        },
    };
}

/**
 * Runs `fn` against a fresh harness and removes its directories afterwards.
 */
export async function withHarness(config: ComposeConfig, fn: (h: Harness) => Promise<void>, overrides: Partial<EngineSettings> = {}): Promise<void> {
    const h = createHarness(config, overrides);
    try {
        await fn(h);
    } finally {
        h.cleanup();
    }
}
