import { CircularDependencyError, ServiceNotFoundError } from "./errors.js";
import { StopOrderMode } from "./runtime/types.js";

export type DependencyGraph = ReadonlyMap<string, readonly string[]>;

/**
 * Depth-first topological sort. Every service appears after all of its
 * dependencies. Throws CircularDependencyError naming the service at which
 * the cycle was found, and ServiceNotFoundError for an undeclared dependency.
 */
export function resolveStartOrder(graph: DependencyGraph, roots: Iterable<string> = graph.keys()): string[] {
    const visiting = new Set<string>();
    const visited = new Set<string>();
    const order: string[] = [];

    function visit(name: string) {
        if (visiting.has(name)) {
            throw new CircularDependencyError(name);
        }
        if (visited.has(name)) {
            return;
        }

        const deps = graph.get(name);
        if (!deps) {
            throw new ServiceNotFoundError(name);
        }

        visiting.add(name);
        for (const dep of deps) {
            visit(dep);
        }
        visiting.delete(name);
        visited.add(name);
        order.push(name);
    }

    for (const name of roots) {
        visit(name);
    }
    return order;
}

/**
 * Order in which existing containers are stopped.
 *
 * "declared" reverses the declaration order, which only matches reverse
 * dependency order when services are declared dependencies-first.
 * "reverse-dependency" reverses the resolved start order instead.
 */
export function resolveStopOrder(graph: DependencyGraph, existing: ReadonlySet<string>, mode: StopOrderMode = "declared"): string[] {
    const base = mode === "declared" ? [ ...graph.keys() ] : resolveStartOrder(graph);
    return base.reverse().filter((name) => existing.has(name));
}
