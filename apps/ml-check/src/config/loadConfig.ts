/**
 * @fileoverview Configuration Loader
 *
 * Loads ml-check settings from a YAML file. Every key is optional;
 * missing keys take the built-in defaults, keys of the wrong type are
 * rejected.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse as parseYaml } from "yaml";
import type { EngineLogger } from "@mltriage/engine";
import { FilterMode, isFilterMode } from "../domain/filters/PatchFilter.js";
import { expandHome } from "../domain/utils/paths.js";

/**
 * ml-check settings
 */
export interface MlCheckConfig {
    readonly archive: {
        /** Monthly archive URL template ({year}, {month}) */
        readonly monthlyUrl: string;
        /** Thread index URL template ({year}, {month}) */
        readonly threadUrl: string;
    };
    readonly cache: {
        readonly directory: string;
    };
    readonly defaults: {
        readonly daysBack: number;
        readonly requiredAcks: number;
        readonly mode: FilterMode;
        readonly patchOutput: string;
    };
}

/**
 * Raised for a configuration file that cannot be used
 */
export class ConfigError extends Error {
    constructor(message: string, readonly filePath?: string) {
        super(filePath ? `${message} (${filePath})` : message);
        this.name = "ConfigError";
    }
}

export const DEFAULT_CONFIG: MlCheckConfig = {
    archive: {
        monthlyUrl: "https://lists.ubuntu.com/archives/kernel-team/{year}-{month}.txt.gz",
        threadUrl : "https://lists.ubuntu.com/archives/kernel-team/{year}-{month}/thread.html",
    },
    cache: {
        directory: "~/.cache/ml-check",
    },
    defaults: {
        daysBack    : 14,
        requiredAcks: 2,
        mode        : FilterMode.NeedsAcks,
        patchOutput : "out",
    },
};

/** File name of the cache database inside the cache directory */
export const kCACHE_DATABASE = "archive.db";

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read an optional sub-section of the file.
 */
function readSection(parent: Record<string, unknown>, key: string, filePath: string): Record<string, unknown> {
    const section = parent[key];
    if (section === undefined || section === null) {
        return {};
    }
    if (!isRecord(section)) {
        throw new ConfigError(`Invalid config: '${key}' must be a mapping`, filePath);
    }
    return section;
}

function readString(section: Record<string, unknown>, key: string, fallback: string, filePath: string): string {
    const value = section[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "string" || value.length === 0) {
        throw new ConfigError(`Invalid config: '${key}' must be a non-empty string`, filePath);
    }
    return value;
}

function readCount(section: Record<string, unknown>, key: string, fallback: number, filePath: string): number {
    const value = section[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
        throw new ConfigError(`Invalid config: '${key}' must be a non-negative integer`, filePath);
    }
    return value;
}

function readTemplate(section: Record<string, unknown>, key: string, fallback: string, filePath: string): string {
    const value = readString(section, key, fallback, filePath);
    if (!value.includes("{year}") || !value.includes("{month}")) {
        throw new ConfigError(`Invalid config: '${key}' must contain {year} and {month}`, filePath);
    }
    return value;
}

/**
 * Load settings from a YAML file.
 *
 * @param filePath - Path to ml-check.yml
 * @returns Settings, with defaults for missing keys
 * @throws ConfigError if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig("./config/ml-check.yml");
 * console.log(config.defaults.daysBack);
 * // 14
 * ```
 */
export function loadConfig(filePath: string): MlCheckConfig {
    if (!existsSync(filePath)) {
        throw new ConfigError("Config file not found", filePath);
    }

    let parsed: unknown;
    try {
        parsed = parseYaml(readFileSync(filePath, "utf-8"));
    }
    catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Config file is not valid YAML: ${reason}`, filePath);
    }

    // An empty file means "all defaults"
    if (parsed === null || parsed === undefined) {
        return DEFAULT_CONFIG;
    }
    if (!isRecord(parsed)) {
        throw new ConfigError("Invalid config format: expected a mapping", filePath);
    }

    const archive = readSection(parsed, "archive", filePath);
    const cache = readSection(parsed, "cache", filePath);
    const defaults = readSection(parsed, "defaults", filePath);

    const mode = defaults.mode ?? DEFAULT_CONFIG.defaults.mode;
    if (!isFilterMode(mode)) {
        throw new ConfigError(`Invalid config: unknown mode '${String(mode)}'`, filePath);
    }

    return {
        archive: {
            monthlyUrl: readTemplate(archive, "monthlyUrl", DEFAULT_CONFIG.archive.monthlyUrl, filePath),
            threadUrl : readTemplate(archive, "threadUrl", DEFAULT_CONFIG.archive.threadUrl, filePath),
        },
        cache: {
            directory: readString(cache, "directory", DEFAULT_CONFIG.cache.directory, filePath),
        },
        defaults: {
            daysBack    : readCount(defaults, "daysBack", DEFAULT_CONFIG.defaults.daysBack, filePath),
            requiredAcks: readCount(defaults, "requiredAcks", DEFAULT_CONFIG.defaults.requiredAcks, filePath),
            mode,
            patchOutput : readString(defaults, "patchOutput", DEFAULT_CONFIG.defaults.patchOutput, filePath),
        },
    };
}

/**
 * Load settings with fallback to the built-in defaults.
 *
 * @param filePath - Path to ml-check.yml
 * @param logger - Receives a warning when the file cannot be used
 */
export function loadConfigWithFallback(filePath: string, logger?: EngineLogger): MlCheckConfig {
    try {
        return loadConfig(filePath);
    }
    catch (error) {
        logger?.warn("Failed to load config, using defaults", {
            filePath,
            error: error instanceof Error ? error.message : String(error),
        });
        return DEFAULT_CONFIG;
    }
}

/**
 * Path of the cache database. ML_CHECK_CACHE_DIR overrides the
 * configured directory; "~" is expanded.
 */
export function resolveCacheDatabase(
    config: MlCheckConfig,
    env: Readonly<Record<string, string | undefined>> = process.env
): string {
    const directory = env.ML_CHECK_CACHE_DIR || config.cache.directory;
    return join(expandHome(directory), kCACHE_DATABASE);
}
