import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import test from "node:test";
import { CliContext, main, parseCommandLine, USAGE, UsageError } from "../../backend/cli.js";
import { FakeRuntime } from "../fakes/fake-runtime.js";
import { makeTempDir, removeDir } from "../fakes/fixtures.js";

const COMPOSE = `services:
  web:
    image: nginx:latest
    depends_on: [ db ]
  db:
    image: postgres:16
`;

function stripAnsi(line: string): string {
    return line.replace(/\x1b\[[0-9;]*m/g, "");
}

interface CliRun {
    code: number;
    lines: string[];
    runtime: FakeRuntime;
}

async function runCli(argv: string[], setup: (cwd: string, runtime: FakeRuntime) => void = () => undefined, env: NodeJS.ProcessEnv = {}): Promise<CliRun> {
    const cwd = makeTempDir("cc-cli-");
    const home = makeTempDir("cc-home-");
    const runtime = new FakeRuntime();
    const lines: string[] = [];
    const context: CliContext = {
        env: { HOME: home,
            ...env },
        cwd,
        out: (line) => lines.push(...stripAnsi(line).split("\n")),
        createRuntime: () => runtime,
    };

    try {
        setup(cwd, runtime);
        const code = await main(argv, context);
        return { code,
            lines,
            runtime };
    } finally {
        removeDir(cwd);
        removeDir(home);
    }
}

function writeCompose(name = "container-compose.yml", content = COMPOSE): (cwd: string) => void {
    return (cwd) => fs.writeFileSync(path.join(cwd, name), content);
}

test("global options and commands are parsed", () => {
    assert.deepEqual(parseCommandLine([ "-v", "-f", "stack.yml", "up", "web" ]), {
        kind: "run",
        file: "stack.yml",
        verbose: true,
        command: { name: "up",
            services: [ "web" ],
            detach: false,
            forceRecreate: false },
    });
    assert.deepEqual(parseCommandLine([ "--file=other.yml", "down", "--volumes" ]), {
        kind: "run",
        file: "other.yml",
        verbose: false,
        command: { name: "down",
            removeVolumes: true },
    });
    assert.deepEqual(parseCommandLine([ "--help" ]), { kind: "help" });
    assert.deepEqual(parseCommandLine([ "--version", "up" ]), { kind: "version" });
});

test("exec keeps the command and drops terminal flags", () => {
    const parsed = parseCommandLine([ "exec", "-it", "web", "--", "ls", "-la" ]);
    assert.deepEqual(parsed.kind === "run" ? parsed.command : undefined, {
        name: "exec",
        service: "web",
        command: [ "ls", "-la" ],
    });
});

test("logs and single-service commands are parsed", () => {
    const logs = parseCommandLine([ "logs", "-f", "db" ]);
    assert.deepEqual(logs.kind === "run" ? logs.command : undefined, { name: "logs",
        service: "db",
        follow: true });

    const stop = parseCommandLine([ "stop" ]);
    assert.deepEqual(stop.kind === "run" ? stop.command : undefined, { name: "stop",
        service: undefined });
});

test("bad command lines are usage errors", () => {
    assert.throws(() => parseCommandLine([]), { message: "No command given" });
    assert.throws(() => parseCommandLine([ "launch" ]), { message: "Unknown command: launch" });
    assert.throws(() => parseCommandLine([ "--bogus", "up" ]), { message: "Unknown option: --bogus" });
    assert.throws(() => parseCommandLine([ "-f" ]), { message: "-f requires a path" });
    assert.throws(() => parseCommandLine([ "logs" ]), { message: "logs requires exactly one service name" });
    assert.throws(() => parseCommandLine([ "exec" ]), { message: "exec requires a service name" });
    assert.throws(() => parseCommandLine([ "start", "a", "b" ]), { message: "start takes at most one service" });
    assert.throws(() => parseCommandLine([ "ps", "--all" ]), UsageError);
    assert.throws(() => parseCommandLine([ "up", "--recreate" ]), UsageError);
});

test("up accepts the detach and force-recreate flags", () => {
    const short = parseCommandLine([ "up", "-d", "web" ]);
    assert.deepEqual(short.kind === "run" ? short.command : undefined, { name: "up",
        services: [ "web" ],
        detach: true,
        forceRecreate: false });

    const long = parseCommandLine([ "up", "--detach", "--force-recreate" ]);
    assert.deepEqual(long.kind === "run" ? long.command : undefined, { name: "up",
        services: [],
        detach: true,
        forceRecreate: true });
});

test("up reports its flags and recreates existing containers", async () => {
    const { code, lines, runtime } = await runCli([ "up", "-d", "--force-recreate" ], (cwd, fake) => {
        writeCompose()(cwd);
        fake.addContainer("db", "postgres:16");
    });

    assert.equal(code, 0);
    assert.ok(lines.includes("[i] Starting services (detach: true, force_recreate: true)"));
    assert.deepEqual(runtime.commands("rm"), [ [ "rm", "db" ] ]);
    assert.deepEqual(runtime.commands("run"), [ [ "run", "db" ], [ "run", "web" ] ]);
    assert.equal(lines[lines.length - 1], "[✓] Started 2 service(s)");
});

test("main prints usage with exit code 2 on a usage error", async () => {
    const { code, lines } = await runCli([]);
    assert.equal(code, 2);
    assert.equal(lines[0], "error: No command given");
    assert.equal(lines[1], USAGE.split("\n")[0]);
});

test("main prints the version", async () => {
    const { code, lines } = await runCli([ "--version" ]);
    assert.equal(code, 0);
    assert.deepEqual(lines, [ "container-compose 0.2.0" ]);
});

test("up loads the compose file from cwd and starts services", async () => {
    const { code, lines, runtime } = await runCli([ "up" ], writeCompose());

    assert.equal(code, 0);
    assert.equal(lines[0], "Container Compose v0.2.0");
    assert.match(lines[1] ?? "", /^\[i\] Using config file: .*container-compose\.yml$/);
    assert.equal(lines[2], "[✓] Configuration loaded successfully");
    assert.deepEqual(runtime.commands("run"), [ [ "run", "db" ], [ "run", "web" ] ]);
    assert.equal(lines[lines.length - 1], "[✓] Started 2 service(s)");
});

test("an explicit file is used and compile warnings are shown", async () => {
    const content = "services:\n  app:\n    image: app:1\n    restart: always\n";
    const { code, lines } = await runCli([ "-f", "stack.yml", "ps" ], writeCompose("stack.yml", content));

    assert.equal(code, 0);
    assert.ok(lines.includes("[!] Unknown key \"restart\" at services.app.restart, ignored"));
    assert.ok(lines.some((l) => l.startsWith("app") && l.includes("Not Created") && l.includes("N/A")));
});

test("a missing compose file fails with exit code 1", async () => {
    const { code, lines } = await runCli([ "ps" ]);

    assert.equal(code, 1);
    assert.ok(lines.some((l) => l.startsWith("[✗] Failed to load ") && l.endsWith("container-compose.yml:")));
});

test("command failures are reported with exit code 1", async () => {
    const { code, lines } = await runCli([ "exec", "ghost" ], writeCompose());

    assert.equal(code, 1);
    assert.equal(lines[lines.length - 1], "[✗] Command failed: Service 'ghost' not found");
});

test("invalid settings fail the command", async () => {
    const { code, lines } = await runCli([ "ps" ], writeCompose(), { CONTAINER_COMPOSE_STOP_ORDER: "random" });

    assert.equal(code, 1);
    assert.equal(lines[lines.length - 1], "[✗] Command failed: CONTAINER_COMPOSE_STOP_ORDER must be one of declared, reverse-dependency, got \"random\"");
});

test("check reports the runtime without a compose file", async () => {
    const available = await runCli([ "check" ]);
    assert.equal(available.code, 0);
    assert.deepEqual(available.lines, [ "[✓] Runtime apple-container 0.5.0 is available" ]);

    const missing = await runCli([ "check" ], (_cwd, runtime) => {
        runtime.statusBehaviour = "missing";
    });
    assert.equal(missing.code, 1);
    assert.deepEqual(missing.lines, [ "[✗] Container runtime \"container\" is not available" ]);
});
