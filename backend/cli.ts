import { parseArgs } from "node:util";
import { log } from "./log.js";
import { ComposeError } from "./errors.js";
import { ConsoleReporter } from "./reporter.js";
import { EngineSettings, loadSettings } from "./settings.js";
import { LifecycleOrchestrator } from "./orchestrator.js";
import { ContainerRuntime } from "./runtime/runtime-adapter.js";
import { AppleContainerRuntime } from "./runtime/apple-container/adapter.js";
import { RuntimeInvoker } from "./runtime/apple-container/invoker.js";
import { detectCapabilities } from "./runtime/apple-container/capabilities.js";
import { findComposeFile, loadComposeFile } from "./runtime/apple-container/compiler.js";

export const VERSION = "0.2.0";

export type ComposeCommand =
    | { name: "up"; services: string[]; detach: boolean; forceRecreate: boolean }
    | { name: "down"; removeVolumes: boolean }
    | { name: "ps" }
    | { name: "exec"; service: string; command: string[] }
    | { name: "logs"; service: string; follow: boolean }
    | { name: "pull"; service?: string }
    | { name: "start"; service?: string }
    | { name: "stop"; service?: string }
    | { name: "restart"; service?: string }
    | { name: "check" };

export type CommandLine =
    | { kind: "help" }
    | { kind: "version" }
    | { kind: "run"; file?: string; verbose: boolean; command: ComposeCommand };

export class UsageError extends Error {}

export const USAGE = `Usage: container-compose [options] <command> [args]

Options:
  -f, --file <path>   Compose file (default: container-compose.yml)
  -v, --verbose       Print every runtime command
  -h, --help          Show this help
      --version       Show the version

Commands:
  up [-d] [--force-recreate] [service...]
                            Create and start services (containers always run
                            detached; --force-recreate replaces existing ones)
  down [-v]                 Stop and remove all containers (-v: also named volumes)
  ps                        List services and their status
  start [service]           Start services, reusing stopped containers
  stop [service]            Stop running containers without removing them
  restart [service]         Stop, then start services
  logs [-f] <service>       Show container logs
  exec <service> [cmd...]   Run a command in a running container
  pull [service]            Pull service images
  check                     Check the container runtime`;

const EXEC_FLAGS = new Set([ "-i", "-t", "-it", "-ti", "--interactive", "--tty" ]);

function optionalService(name: string, args: string[]): string | undefined {
    const { positionals } = parseArgs({ args,
        allowPositionals: true,
        strict: true });
    if (positionals.length > 1) {
        throw new UsageError(`${name} takes at most one service`);
    }
    return positionals[0];
}

function parseCommand(name: string, args: string[]): ComposeCommand {
    switch (name) {
        case "up": {
            const { values, positionals } = parseArgs({
                args,
                allowPositionals: true,
                strict: true,
                options: {
                    detach: { type: "boolean",
                        short: "d" },
                    "force-recreate": { type: "boolean" },
                },
            });
            return { name,
                services: positionals,
                detach: values.detach ?? false,
                forceRecreate: values["force-recreate"] ?? false };
        }
        case "down": {
            const { values } = parseArgs({
                args,
                strict: true,
                options: { volumes: { type: "boolean",
                    short: "v" } },
            });
            return { name,
                removeVolumes: values.volumes ?? false };
        }
        case "ps":
        case "check":
            parseArgs({ args,
                strict: true });
            return { name };
        case "exec": {
            let rest = args;
            while (rest.length > 0 && EXEC_FLAGS.has(rest[0] ?? "")) {
                rest = rest.slice(1);
            }
            const [ service, ...command ] = rest;
            if (!service) {
                throw new UsageError("exec requires a service name");
            }
            return { name,
                service,
                command: command[0] === "--" ? command.slice(1) : command };
        }
        case "logs": {
            const { values, positionals } = parseArgs({
                args,
                allowPositionals: true,
                strict: true,
                options: { follow: { type: "boolean",
                    short: "f" } },
            });
            const service = positionals[0];
            if (!service || positionals.length > 1) {
                throw new UsageError("logs requires exactly one service name");
            }
            return { name,
                service,
                follow: values.follow ?? false };
        }
        case "pull":
        case "start":
        case "stop":
        case "restart":
            return { name,
                service: optionalService(name, args) };
        default:
            throw new UsageError(`Unknown command: ${name}`);
    }
}

export function parseCommandLine(argv: string[]): CommandLine {
    let file: string | undefined;
    let verbose = false;
    let i = 0;

    while (i < argv.length) {
        const token = argv[i] ?? "";
        if (token === "-h" || token === "--help") {
            return { kind: "help" };
        }
        if (token === "--version") {
            return { kind: "version" };
        }
        if (token === "-v" || token === "--verbose") {
            verbose = true;
            i++;
            continue;
        }
        if (token === "-f" || token === "--file") {
            file = argv[i + 1];
            if (!file) {
                throw new UsageError(`${token} requires a path`);
            }
            i += 2;
            continue;
        }
        if (token.startsWith("--file=")) {
            file = token.substring("--file=".length);
            i++;
            continue;
        }
        if (token.startsWith("-")) {
            throw new UsageError(`Unknown option: ${token}`);
        }
        break;
    }

    const name = argv[i];
    if (!name) {
        throw new UsageError("No command given");
    }

    let command: ComposeCommand;
    try {
        command = parseCommand(name, argv.slice(i + 1));
    } catch (e) {
        if (e instanceof UsageError) {
            throw e;
        }
        // parseArgs reports unknown options and stray positionals as TypeError
        throw new UsageError(e instanceof Error ? e.message : String(e));
    }

    return { kind: "run",
        file,
        verbose,
        command };
}

export interface CliContext {
    env: NodeJS.ProcessEnv;
    cwd: string;
    out: (line: string) => void;
    createRuntime: (settings: EngineSettings, reporter: ConsoleReporter) => ContainerRuntime;
}

function defaultContext(): CliContext {
    return {
        env: process.env,
        cwd: process.cwd(),
        out: (line) => console.log(line),
        createRuntime: (settings, reporter) => new AppleContainerRuntime(
            new RuntimeInvoker(settings.runtimeBinary, (argv) => reporter.command(argv)),
            settings.listFormat,
        ),
    };
}

async function runCommand(orchestrator: LifecycleOrchestrator, command: ComposeCommand, reporter: ConsoleReporter): Promise<void> {
    switch (command.name) {
        case "up":
            reporter.info(`Starting services (detach: ${command.detach}, force_recreate: ${command.forceRecreate})`);
            await orchestrator.up(command.services.length > 0 ? command.services : undefined,
                { forceRecreate: command.forceRecreate });
            return;
        case "down":
            await orchestrator.down(command.removeVolumes);
            return;
        case "ps":
            await orchestrator.ps();
            return;
        case "exec":
            await orchestrator.exec(command.service, command.command);
            return;
        case "logs":
            await orchestrator.logs(command.service, command.follow);
            return;
        case "pull":
            await orchestrator.pull(command.service);
            return;
        case "start":
            await orchestrator.start(command.service);
            return;
        case "stop":
            await orchestrator.stop(command.service);
            return;
        case "restart":
            await orchestrator.restart(command.service);
            return;
        case "check":
            return;
    }
}

async function check(runtime: ContainerRuntime, settings: EngineSettings, reporter: ConsoleReporter): Promise<number> {
    const capabilities = await detectCapabilities(runtime, settings.minimumRuntimeVersion);
    if (!capabilities.available) {
        reporter.error(`Container runtime "${settings.runtimeBinary}" is not available`);
        return 1;
    }
    if (!capabilities.supported) {
        reporter.warning(`Runtime version ${capabilities.runtimeVersion} is older than the supported minimum ${capabilities.minimumVersion}`);
        return 1;
    }
    reporter.success(`Runtime ${capabilities.runtimeName} ${capabilities.runtimeVersion} is available`);
    return 0;
}

/**
 * Runs one command line and returns the process exit code.
 */
export async function main(argv: string[], context: CliContext = defaultContext()): Promise<number> {
    let commandLine: CommandLine;
    try {
        commandLine = parseCommandLine(argv);
    } catch (e) {
        if (e instanceof UsageError) {
            context.out(`error: ${e.message}`);
            context.out(USAGE);
            return 2;
        }
        throw e;
    }

    if (commandLine.kind === "help") {
        context.out(USAGE);
        return 0;
    }
    if (commandLine.kind === "version") {
        context.out(`container-compose ${VERSION}`);
        return 0;
    }

    const reporter = new ConsoleReporter(commandLine.verbose, context.out);
    if (commandLine.verbose && log.getLevel() !== "debug") {
        log.setLevel("info");
    }

    try {
        const settings = loadSettings(context.env);
        const runtime = context.createRuntime(settings, reporter);

        if (commandLine.command.name === "check") {
            return await check(runtime, settings, reporter);
        }

        const file = findComposeFile(context.cwd, commandLine.file);
        reporter.header(`Container Compose v${VERSION}`);
        reporter.info(`Using config file: ${file}`);

        const loaded = loadComposeFile(file, context.env);
        reporter.success("Configuration loaded successfully");
        for (const warning of loaded.warnings) {
            reporter.warning(warning);
        }

        const orchestrator = new LifecycleOrchestrator({
            config: loaded.config,
            runtime,
            reporter,
            settings,
            cwd: context.cwd,
        });

        reporter.separator();
        await runCommand(orchestrator, commandLine.command, reporter);
        return 0;
    } catch (e) {
        if (e instanceof ComposeError) {
            reporter.error(e.code === "CONFIG_LOAD_FAILED" ? e.message : `Command failed: ${e.message}`);
            return 1;
        }
        const msg = e instanceof Error ? e.message : String(e);
        log.error("cli", e);
        reporter.error(`Command failed: ${msg}`);
        return 1;
    }
}
