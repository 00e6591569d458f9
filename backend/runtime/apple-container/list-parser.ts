import { ContainerListEntry, ListFormat } from "../types.js";

/**
 * Turns the stdout of `container list` into entries. Kept behind an interface
 * so callers never depend on the runtime's output format.
 */
export interface ContainerListParser {
    parse(stdout: string): ContainerListEntry[];
}

function mapState(raw: string): ContainerListEntry["state"] {
    const lower = raw.toLowerCase();
    if (lower.includes("running")) {
        return "running";
    }
    if (lower.includes("stopped") || lower.includes("exited")) {
        return "stopped";
    }
    return "unknown";
}

/**
 * Human-readable table: a header line, then one row per container whose first
 * column is the name and second the image.
 */
export class TableListParser implements ContainerListParser {
    parse(stdout: string): ContainerListEntry[] {
        return stdout
            .split("\n")
            .slice(1)
            .map((line) => line.trim().split(/\s+/).filter(Boolean))
            .filter((parts) => parts.length > 0)
            .map((parts) => ({
                name: parts[0] ?? "",
                image: parts[1] ?? "",
                state: mapState(parts.slice(2).find((part) => mapState(part) !== "unknown") ?? ""),
            }));
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === "object" && !Array.isArray(value);
}

function getConfiguration(item: Record<string, unknown>): Record<string, unknown> {
    return isRecord(item.configuration) ? item.configuration : {};
}

function readContainerName(item: Record<string, unknown>): string {
    const direct = item.name ?? item.Name ?? item.Names ?? item.id ?? item.ID;
    if (typeof direct === "string" && direct) {
        return direct;
    }

    const nestedId = getConfiguration(item).id;
    if (typeof nestedId === "string" && nestedId) {
        return nestedId;
    }

    return "";
}

function readContainerState(item: Record<string, unknown>): string {
    const direct = item.state ?? item.State ?? item.Status ?? item.status;
    if (typeof direct === "string") {
        return direct;
    }

    const nestedStatus = getConfiguration(item).status;
    return typeof nestedStatus === "string" ? nestedStatus : "";
}

function readContainerImage(item: Record<string, unknown>): string {
    const direct = item.image ?? item.Image;
    if (typeof direct === "string" && direct) {
        return direct;
    }

    const image = getConfiguration(item).image;
    if (typeof image === "string") {
        return image;
    }
    if (isRecord(image) && typeof image.reference === "string") {
        return image.reference;
    }

    return "";
}

function isInternalContainer(item: Record<string, unknown>): boolean {
    const labelsRaw = item.labels ?? item.Labels ?? getConfiguration(item).labels;
    if (!isRecord(labelsRaw)) {
        return false;
    }
    return labelsRaw["com.apple.container.resource.role"] === "builder";
}

function parseJsonRecords(stdout: string): Record<string, unknown>[] {
    const trimmed = stdout.trim();
    if (!trimmed) {
        return [];
    }

    try {
        const parsed: unknown = JSON.parse(trimmed);
        const items: unknown[] = Array.isArray(parsed) ? parsed : [ parsed ];
        return items.filter(isRecord);
    } catch {
        // JSONL fallback, one object per line
        return trimmed
            .split("\n")
            .filter((line) => line.trim().length > 0)
            .map((line): unknown => {
                try {
                    return JSON.parse(line);
                } catch {
                    return null;
                }
            })
            .filter(isRecord);
    }
}

/**
 * Structured output of `container list --format json`.
 */
export class JsonListParser implements ContainerListParser {
    parse(stdout: string): ContainerListEntry[] {
        return parseJsonRecords(stdout)
            .filter((item) => !isInternalContainer(item))
            .map((item) => ({
                name: readContainerName(item),
                image: readContainerImage(item),
                state: mapState(readContainerState(item)),
            }))
            .filter((entry) => entry.name.length > 0);
    }
}

export function createListParser(format: ListFormat): ContainerListParser {
    return format === "json" ? new JsonListParser() : new TableListParser();
}
