import { BoundedResult, CommandResult, ListFormat, RunRequest } from "./types.js";

/**
 * The external runtime as seen by the engine. The production implementation
 * shells out to Apple's `container` CLI; tests substitute an in-memory fake.
 */
export abstract class ContainerRuntime {
    abstract readonly listFormat: ListFormat;

    abstract run(request: RunRequest): Promise<CommandResult>;
    abstract start(name: string): Promise<CommandResult>;
    abstract stop(name: string, timeoutMs: number): Promise<BoundedResult>;
    abstract kill(name: string): Promise<CommandResult>;
    abstract remove(name: string): Promise<CommandResult>;
    abstract list(includeStopped: boolean): Promise<CommandResult>;
    abstract logs(identifier: string, follow: boolean): Promise<number>;
    abstract exec(name: string, command: string[]): Promise<number>;
    abstract pull(image: string): Promise<CommandResult>;
    abstract version(): Promise<CommandResult>;
    abstract systemStatus(timeoutMs: number): Promise<BoundedResult>;
}
