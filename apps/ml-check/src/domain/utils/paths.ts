/**
 * @fileoverview Path helpers
 *
 * @module domain/utils/paths
 */

import { homedir } from "os";

/**
 * Expand a leading "~" to the home directory.
 *
 * @example
 * ```typescript
 * expandHome("~/.cache/ml-check"); // "/home/jane/.cache/ml-check"
 * ```
 */
export function expandHome(path: string, home: string = homedir()): string {
    if (path === "~") {
        return home;
    }
    return path.startsWith("~/") ? `${home}${path.slice(1)}` : path;
}
