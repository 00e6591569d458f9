import fs from "fs";
import path from "path";
import YAML from "yaml";
import dotenv from "dotenv";
import { ConfigLoadError } from "../../errors.js";
import { ComposeConfig, CompileProblem, CompileResult, NetworkSpec, ServiceSpec, VolumeSpec } from "../types.js";

export const acceptedComposeFileNames = [
    "container-compose.yml",
    "container-compose.yaml",
    "compose.yaml",
    "compose.yml",
];

const SUPPORTED_SERVICE_KEYS = new Set([
    "image", "ports", "volumes", "environment", "depends_on",
    "command", "working_dir"
]);

const SUPPORTED_TOP_LEVEL_KEYS = new Set([
    "version", "services", "volumes", "networks"
]);

const DEFAULT_VERSION = "1.0";
const DEFAULT_NETWORK_DRIVER = "bridge";

type Mapping = Map<unknown, unknown>;

function isMapping(value: unknown): value is Mapping {
    return value instanceof Map;
}

// keys in declaration order, integer-like ones included
function entries(map: Mapping): [ string, unknown ][] {
    return [ ...map ].map(([ k, v ]): [ string, unknown ] => [ String(k), v ]);
}

function scalarToString(value: unknown): string {
    return value == null ? "" : String(value);
}

export function normalizeEnvironment(env: unknown): string[] {
    if (Array.isArray(env)) {
        return env.filter((item) => item != null).map(String);
    }
    if (isMapping(env)) {
        return entries(env).map(([ k, v ]) => `${k}=${scalarToString(v)}`);
    }
    if (typeof env === "string") {
        return [ env ];
    }
    return [];
}

function normalizeDependsOn(dep: unknown, servicePath: string, warnings: string[]): string[] {
    if (Array.isArray(dep)) {
        return dep.map(String);
    }
    if (isMapping(dep)) {
        warnings.push(`${servicePath}.depends_on: object form detected, conditions ignored, only service names extracted`);
        return entries(dep).map(([ name ]) => name);
    }
    if (typeof dep === "string") {
        return [ dep ];
    }
    return [];
}

function toStringList(value: unknown): string[] {
    return Array.isArray(value) ? value.map(String) : [];
}

function warnUnknownKeys(svc: Mapping, keyPath: string, warnings: string[]): void {
    for (const [ key ] of entries(svc)) {
        if (!SUPPORTED_SERVICE_KEYS.has(key)) {
            warnings.push(`Unknown key "${key}" at ${keyPath}.${key}, ignored`);
        }
    }
}

function buildService(name: string, svc: Mapping, warnings: string[]): ServiceSpec {
    const service: ServiceSpec = {
        name,
        image: scalarToString(svc.get("image")),
        ports: toStringList(svc.get("ports")),
        volumes: toStringList(svc.get("volumes")),
        environment: normalizeEnvironment(svc.get("environment")),
        dependsOn: normalizeDependsOn(svc.get("depends_on"), `services.${name}`, warnings),
    };

    const command = svc.get("command");
    if (Array.isArray(command) && command.length > 0) {
        service.command = command.map(String);
    }
    const workingDir = svc.get("working_dir");
    if (workingDir != null) {
        service.workingDir = String(workingDir);
    }
    return service;
}

function buildVolumes(raw: unknown): Map<string, VolumeSpec> {
    const volumes = new Map<string, VolumeSpec>();
    if (!isMapping(raw)) {
        return volumes;
    }
    for (const [ name, def ] of entries(raw)) {
        const driver = isMapping(def) ? scalarToString(def.get("driver")) : "";
        volumes.set(name, { name,
            driver });
    }
    return volumes;
}

function buildNetworks(raw: unknown): Map<string, NetworkSpec> {
    const networks = new Map<string, NetworkSpec>();
    if (!isMapping(raw)) {
        return networks;
    }
    for (const [ name, def ] of entries(raw)) {
        const driver = isMapping(def) && def.get("driver") != null ? String(def.get("driver")) : DEFAULT_NETWORK_DRIVER;
        networks.set(name, { name,
            driver });
    }
    return networks;
}

function emptyResult(errors: CompileProblem[], warnings: string[]): CompileResult {
    return {
        config: {
            version: DEFAULT_VERSION,
            services: new Map(),
            volumes: new Map(),
            networks: new Map(),
        },
        errors,
        warnings,
    };
}

/**
 * Parses the YAML, then substitutes variables inside string values only, so
 * a substituted value can never change the document's structure.
 */
function parseInterpolated(yamlContent: string, env: Record<string, string | undefined>): unknown {
    const doc = YAML.parseDocument(yamlContent);
    const firstError = doc.errors[0];
    if (firstError) {
        throw firstError;
    }

    YAML.visit(doc, {
        Scalar(key, node) {
            if (key !== "key" && typeof node.value === "string") {
                node.value = interpolate(node.value, env);
            }
        },
    });
    return doc.toJS({ mapAsMap: true });
}

/**
 * Parses and validates a compose document. Never throws; problems are
 * returned as errors (blocking) and warnings (advisory).
 */
export function compile(yamlContent: string, env: Record<string, string | undefined> = {}): CompileResult {
    const errors: CompileProblem[] = [];
    const warnings: string[] = [];

    if (!yamlContent.trim()) {
        errors.push({ key: "",
            path: "",
            message: "Empty compose file" });
        return emptyResult(errors, warnings);
    }

    let doc: unknown;
    try {
        doc = parseInterpolated(yamlContent, env);
    } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        errors.push({ key: "",
            path: "",
            message: `YAML parse error: ${msg}` });
        return emptyResult(errors, warnings);
    }

    if (!isMapping(doc)) {
        errors.push({ key: "",
            path: "",
            message: "Invalid compose file: not an object" });
        return emptyResult(errors, warnings);
    }

    for (const [ key ] of entries(doc)) {
        if (!SUPPORTED_TOP_LEVEL_KEYS.has(key)) {
            warnings.push(`Unknown top-level key "${key}", ignored`);
        }
    }

    const rawServices = doc.get("services");
    if (!isMapping(rawServices)) {
        errors.push({ key: "services",
            path: "services",
            message: "No services defined" });
        return emptyResult(errors, warnings);
    }

    const services = new Map<string, ServiceSpec>();

    for (const [ svcName, svcDef ] of entries(rawServices)) {
        if (!isMapping(svcDef)) {
            errors.push({
                key: svcName,
                path: `services.${svcName}`,
                message: `Service "${svcName}" is not a valid object`
            });
            continue;
        }

        warnUnknownKeys(svcDef, `services.${svcName}`, warnings);

        if (!svcDef.get("image")) {
            errors.push({
                key: "image",
                path: `services.${svcName}.image`,
                message: `Service '${svcName}' has no image specified`
            });
            continue;
        }

        const command = svcDef.get("command");
        if (command != null && !Array.isArray(command)) {
            errors.push({
                key: "command",
                path: `services.${svcName}.command`,
                message: `Service '${svcName}' command must be a list of arguments`
            });
            continue;
        }

        services.set(svcName, buildService(svcName, svcDef, warnings));
    }

    for (const [ name, service ] of services) {
        for (const dep of service.dependsOn) {
            if (!services.has(dep)) {
                errors.push({
                    key: "depends_on",
                    path: `services.${name}.depends_on`,
                    message: `Service '${name}' depends on '${dep}' which doesn't exist`
                });
            }
        }
    }

    const version = doc.get("version");
    const config: ComposeConfig = {
        version: version != null ? String(version) : DEFAULT_VERSION,
        services,
        volumes: buildVolumes(doc.get("volumes")),
        networks: buildNetworks(doc.get("networks")),
    };

    return { config,
        errors,
        warnings };
}

/**
 * Substitutes `${VAR}`, `${VAR:-default}`, `${VAR-default}` and `$VAR`; `$$`
 * is a literal `$`. `:-` also replaces an empty value, `-` only an unset one.
 * Unset variables without a default become empty strings.
 */
export function interpolate(content: string, env: Record<string, string | undefined>): string {
    return content.replace(/\$\$|\$\{([A-Za-z_][A-Za-z0-9_]*)(?:(:?)-([^}]*))?\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
        (match: string, braced: string | undefined, colon: string | undefined, fallback: string | undefined, bare: string | undefined) => {
            if (match === "$$") {
                return "$";
            }
            const value = env[braced ?? bare ?? ""];
            if (fallback !== undefined) {
                const missing = colon ? value === undefined || value === "" : value === undefined;
                return missing ? fallback : value ?? "";
            }
            return value ?? "";
        });
}

export function findComposeFile(cwd: string, explicit?: string): string {
    if (explicit) {
        return path.resolve(cwd, explicit);
    }
    for (const filename of acceptedComposeFileNames) {
        const candidate = path.join(cwd, filename);
        if (fs.existsSync(candidate)) {
            return candidate;
        }
    }
    return path.join(cwd, acceptedComposeFileNames[0] ?? "container-compose.yml");
}

export interface LoadedCompose {
    file: string;
    config: ComposeConfig;
    warnings: string[];
}

/**
 * Reads a compose file and the `.env` beside it. Variables from `env` take
 * precedence over `.env` entries.
 */
export function loadComposeFile(file: string, env: NodeJS.ProcessEnv = process.env): LoadedCompose {
    let content: string;
    try {
        content = fs.readFileSync(file, "utf-8");
    } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new ConfigLoadError(file, [ { path: "",
            message: msg } ]);
    }

    const envPath = path.join(path.dirname(file), ".env");
    const fileEnv = fs.existsSync(envPath) ? dotenv.parse(fs.readFileSync(envPath, "utf-8")) : {};

    const { config, errors, warnings } = compile(content, { ...fileEnv,
        ...env });

    if (errors.length > 0) {
        throw new ConfigLoadError(file, errors.map((e) => ({ path: e.path,
            message: e.message })));
    }

    return { file,
        config,
        warnings };
}
