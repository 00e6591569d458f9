import { ChildProcess, spawn } from "child_process";
import { log } from "../../log.js";
import { RuntimeInvocationError } from "../../errors.js";
import { BoundedResult, CommandResult } from "../types.js";

export type CommandListener = (argv: string[]) => void;

/**
 * Runs one `<binary> <args...>` process per call. Spawn failures reject with
 * RuntimeInvocationError; a non-zero exit is returned, not thrown.
 */
export class RuntimeInvoker {
    readonly binary: string;
    private onCommand?: CommandListener;

    constructor(binary = "container", onCommand?: CommandListener) {
        this.binary = binary;
        this.onCommand = onCommand;
    }

    capture(args: string[]): Promise<CommandResult> {
        return this.spawnCollecting(args).done;
    }

    /**
     * Like `capture`, but a process still running after `timeoutMs` is killed
     * and reported as `{ timedOut: true }`.
     */
    captureWithin(args: string[], timeoutMs: number): Promise<BoundedResult> {
        const { proc, argv, done } = this.spawnCollecting(args);
        return new Promise((resolve, reject) => {
            const timer = setTimeout(() => {
                log.debug("invoker", `${argv.join(" ")} exceeded ${timeoutMs}ms, killing it`);
                proc.kill("SIGKILL");
                resolve({ timedOut: true });
            }, timeoutMs);

            done.then((result) => {
                clearTimeout(timer);
                resolve({ timedOut: false,
                    result });
            }, (err: unknown) => {
                clearTimeout(timer);
                reject(err);
            });
        });
    }

    inherit(args: string[]): Promise<number> {
        const argv = this.announce(args);
        return new Promise((resolve, reject) => {
            const proc = spawn(this.binary, args, { stdio: "inherit" });
            let settled = false;

            proc.on("error", (err: Error) => {
                if (settled) {
                    return;
                }
                settled = true;
                reject(new RuntimeInvocationError(argv, null, err.message));
            });
            proc.on("close", (code: number | null) => {
                if (settled) {
                    return;
                }
                settled = true;
                resolve(code ?? 1);
            });
        });
    }

    private spawnCollecting(args: string[]): { proc: ChildProcess; argv: string[]; done: Promise<CommandResult> } {
        const argv = this.announce(args);
        const proc = spawn(this.binary, args);
        const done = new Promise<CommandResult>((resolve, reject) => {
            let stdout = "";
            let stderr = "";
            let settled = false;

            proc.stdout?.on("data", (d: Buffer) => {
                stdout += d.toString();
            });
            proc.stderr?.on("data", (d: Buffer) => {
                stderr += d.toString();
            });
            proc.on("close", (code: number | null) => {
                if (settled) {
                    return;
                }
                settled = true;
                resolve({ stdout,
                    stderr,
                    exitCode: code ?? 1 });
            });
            proc.on("error", (err: Error) => {
                if (settled) {
                    return;
                }
                settled = true;
                reject(new RuntimeInvocationError(argv, null, err.message));
            });
        });
        return { proc,
            argv,
            done };
    }

    private announce(args: string[]): string[] {
        const argv = this.argv(args);
        log.debug("invoker", argv.join(" "));
        this.onCommand?.(argv);
        return argv;
    }

    private argv(args: string[]): string[] {
        return [ this.binary, ...args ];
    }
}
