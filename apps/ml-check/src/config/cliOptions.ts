/**
 * @fileoverview Command-line options
 *
 * @module config/cliOptions
 */

import { parseArgs } from "util";
import { FILTER_MODES, isFilterMode, type FilterMode } from "../domain/filters/PatchFilter.js";
import type { MlCheckConfig } from "./loadConfig.js";

export interface CliOptions {
    readonly daysBack: number;
    readonly clearCache: boolean;
    readonly patchOutput: string;
    readonly mode: FilterMode;
    readonly requiredAcks: number;
    readonly showStats: boolean;
    readonly verbose: boolean;
    readonly checkpatchPath: string | null;
    readonly ignoreAckers: readonly string[];
    readonly help: boolean;
}

/**
 * Raised for arguments that cannot be parsed
 */
export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "CliUsageError";
    }
}

export const kUSAGE = `Usage: ml-check [options]

Checks the kernel-team mailing list for patches that still need review.

Options:
  -d, --days-back <n>            How many days back to search
      --clear-cache              Clear the local archive cache first
  -p, --patch-output <dir>       Write patch sets to this directory (emptied first)
      --mode <mode>              Which patch sets to show: ${FILTER_MODES.join(", ")}
      --required-acks <n>        Acks a patch set needs
  -s, --show-stats               Print review statistics as JSON
  -v, --verbose                  Print debug information
  -c, --checkpatch-path <path>   Checker to run on saved patches (env: ML_UBUNTU_CHECKPATCH)
  -i, --ignore-acker <address>   Skip patch sets acked by this address (needs-acks mode, repeatable)
  -h, --help                     Show this help`;

function parseCount(flag: string, raw: string | undefined, fallback: number): number {
    if (raw === undefined) {
        return fallback;
    }
    if (!/^\d+$/.test(raw)) {
        throw new CliUsageError(`${flag} expects a non-negative integer, got "${raw}"`);
    }
    return Number(raw);
}

function readArgs(argv: readonly string[]) {
    try {
        return parseArgs({
            args   : [...argv],
            options: {
                "days-back"      : { type: "string", short: "d" },
                "clear-cache"    : { type: "boolean" },
                "patch-output"   : { type: "string", short: "p" },
                "mode"           : { type: "string" },
                "required-acks"  : { type: "string" },
                "show-stats"     : { type: "boolean", short: "s" },
                "verbose"        : { type: "boolean", short: "v" },
                "checkpatch-path": { type: "string", short: "c" },
                "ignore-acker"   : { type: "string", short: "i", multiple: true },
                "help"           : { type: "boolean", short: "h" },
            },
        }).values;
    }
    catch (error) {
        throw new CliUsageError(error instanceof Error ? error.message : String(error));
    }
}

/**
 * Parse command-line arguments.
 *
 * @param argv - Arguments after the script name
 * @param defaults - Defaults from the config file
 * @param env - Environment (for ML_UBUNTU_CHECKPATCH)
 * @throws CliUsageError on unknown options or bad values
 *
 * @example
 * ```typescript
 * const options = parseCliArgs(process.argv.slice(2), config.defaults);
 * ```
 */
export function parseCliArgs(
    argv: readonly string[],
    defaults: MlCheckConfig["defaults"],
    env: Readonly<Record<string, string | undefined>> = process.env
): CliOptions {
    const values = readArgs(argv);

    const mode = values.mode ?? defaults.mode;
    if (!isFilterMode(mode)) {
        throw new CliUsageError(`--mode must be one of ${FILTER_MODES.join(", ")}, got "${mode}"`);
    }

    return {
        daysBack      : parseCount("--days-back", values["days-back"], defaults.daysBack),
        clearCache    : values["clear-cache"] ?? false,
        patchOutput   : values["patch-output"] ?? defaults.patchOutput,
        mode,
        requiredAcks  : parseCount("--required-acks", values["required-acks"], defaults.requiredAcks),
        showStats     : values["show-stats"] ?? false,
        verbose       : values.verbose ?? false,
        checkpatchPath: values["checkpatch-path"] || env.ML_UBUNTU_CHECKPATCH || null,
        ignoreAckers  : values["ignore-acker"] ?? [],
        help          : values.help ?? false,
    };
}
