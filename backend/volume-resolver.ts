import fs from "fs";
import path from "path";
import {
    AnonymousVolumeUnsupportedError,
    HomeDirectoryUnresolvableError,
    VolumeSourceNotFoundError
} from "./errors.js";

export const MANAGED_DIR_NAME = ".container-compose";

export interface ResolvedVolume {
    argument: string;
    warnings: string[];
}

export function namedVolumePath(home: string, name: string): string {
    return path.join(home, MANAGED_DIR_NAME, "volumes", name);
}

/**
 * Turns declared volume strings into `--volume` arguments. Named volumes map
 * onto managed directories under the home directory; anything else is a bind
 * mount whose source must exist.
 */
export class VolumeResolver {
    private namedVolumes: ReadonlySet<string>;
    private cwd: string;
    private home?: string;

    constructor(namedVolumes: Iterable<string>, cwd: string, home: string | undefined) {
        this.namedVolumes = new Set(namedVolumes);
        this.cwd = cwd;
        this.home = home;
    }

    resolve(raw: string): ResolvedVolume {
        if (!raw.includes(":")) {
            throw new AnonymousVolumeUnsupportedError(raw);
        }

        const [ hostPart = "", containerPath = "", ...options ] = raw.split(":");
        const suffix = options.length > 0 ? `:${options.join(":")}` : "";
        const warnings: string[] = [];

        let hostPath: string;
        if (this.namedVolumes.has(hostPart)) {
            hostPath = this.ensureNamedVolume(hostPart);
        } else {
            hostPath = this.resolveBindSource(hostPart);
            if (hostPath.includes(" ")) {
                warnings.push(`Volume path contains spaces, this may cause issues: ${hostPath}`);
            }
        }

        return {
            argument: `${hostPath}:${containerPath}${suffix}`,
            warnings,
        };
    }

    ensureNamedVolume(name: string): string {
        if (!this.home) {
            throw new HomeDirectoryUnresolvableError();
        }
        const dir = namedVolumePath(this.home, name);
        fs.mkdirSync(dir, { recursive: true });
        return dir;
    }

    ensureNamedVolumes(): string[] {
        return [ ...this.namedVolumes ].map((name) => this.ensureNamedVolume(name));
    }

    /**
     * Deletes the managed directories of all named volumes and returns the
     * ones that existed.
     */
    removeNamedVolumes(): string[] {
        if (!this.home) {
            throw new HomeDirectoryUnresolvableError();
        }
        const removed: string[] = [];
        for (const name of this.namedVolumes) {
            const dir = namedVolumePath(this.home, name);
            if (fs.existsSync(dir)) {
                fs.rmSync(dir, { recursive: true,
                    force: true });
                removed.push(dir);
            }
        }
        return removed;
    }

    private resolveBindSource(hostPart: string): string {
        let resolved: string;
        if (hostPart.startsWith("./")) {
            resolved = path.join(this.cwd, hostPart.substring(2));
        } else if (!hostPart.startsWith("/") && !hostPart.includes("/")) {
            resolved = path.join(this.cwd, hostPart);
        } else {
            resolved = hostPart;
        }

        if (!fs.existsSync(path.resolve(this.cwd, resolved))) {
            throw new VolumeSourceNotFoundError(hostPart, resolved);
        }
        return resolved;
    }
}
