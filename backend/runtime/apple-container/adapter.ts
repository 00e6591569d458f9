import { ContainerRuntime } from "../runtime-adapter.js";
import { BoundedResult, CommandResult, ListFormat, RunRequest } from "../types.js";
import { RuntimeInvoker } from "./invoker.js";

export function buildRunArgs(request: RunRequest): string[] {
    const args = [ "run", "--detach", "--name", request.name ];

    for (const v of request.volumes) {
        args.push("--volume", v);
    }
    for (const e of request.environment) {
        args.push("--env", e);
    }
    if (request.workingDir) {
        args.push("--workdir", request.workingDir);
    }

    args.push(request.image);

    if (request.command) {
        args.push(...request.command);
    }
    return args;
}

export function isLocalOnlyImageReference(reference: string): boolean {
    const normalized = reference.trim().toLowerCase();
    return normalized.endsWith(":local") || normalized.startsWith("localhost/");
}

export function buildListArgs(includeStopped: boolean, format: ListFormat): string[] {
    const args = [ "list" ];
    if (includeStopped) {
        args.push("--all");
    }
    if (format === "json") {
        args.push("--format", "json");
    }
    return args;
}

export class AppleContainerRuntime extends ContainerRuntime {
    readonly listFormat: ListFormat;
    private invoker: RuntimeInvoker;

    constructor(invoker: RuntimeInvoker, listFormat: ListFormat = "table") {
        super();
        this.invoker = invoker;
        this.listFormat = listFormat;
    }

    run(request: RunRequest): Promise<CommandResult> {
        return this.invoker.capture(buildRunArgs(request));
    }

    start(name: string): Promise<CommandResult> {
        return this.invoker.capture([ "start", name ]);
    }

    stop(name: string, timeoutMs: number): Promise<BoundedResult> {
        return this.invoker.captureWithin([ "stop", name ], timeoutMs);
    }

    kill(name: string): Promise<CommandResult> {
        return this.invoker.capture([ "kill", name ]);
    }

    remove(name: string): Promise<CommandResult> {
        return this.invoker.capture([ "rm", name ]);
    }

    list(includeStopped: boolean): Promise<CommandResult> {
        return this.invoker.capture(buildListArgs(includeStopped, this.listFormat));
    }

    logs(identifier: string, follow: boolean): Promise<number> {
        const args = [ "logs" ];
        if (follow) {
            args.push("-f");
        }
        args.push(identifier);
        return this.invoker.inherit(args);
    }

    exec(name: string, command: string[]): Promise<number> {
        return this.invoker.inherit([ "exec", name, ...command ]);
    }

    pull(image: string): Promise<CommandResult> {
        return this.invoker.capture([ "images", "pull", image ]);
    }

    version(): Promise<CommandResult> {
        return this.invoker.capture([ "--version" ]);
    }

    systemStatus(timeoutMs: number): Promise<BoundedResult> {
        return this.invoker.captureWithin([ "system", "status" ], timeoutMs);
    }
}
