/**
 * EntityProvider Contract
 *
 * Entity providers are passive data sources. The engine pulls the
 * entities of one time window from a provider at the start of a run.
 *
 * Design principles:
 * - Passive: Providers don't push; engine pulls
 * - Window-based: Each call returns everything inside [since, until]
 * - Lossy by contract: Unparseable records are dropped and counted, never thrown
 */

import type { Entity } from "./Entity.js";

/**
 * Options for fetching entities.
 */
export interface FetchOptions {
    /** Start of the window (inclusive) */
    readonly since?: Date;

    /** End of the window (inclusive, default: now) */
    readonly until?: Date;

    /** Ignore anything cached and fetch again */
    readonly refresh?: boolean;
}

/**
 * Result of fetching entities.
 */
export interface FetchResult<T extends Entity<object> = Entity> {
    /** Entities fetched */
    readonly entities: readonly T[];

    /** Number of raw records that could not be turned into entities */
    readonly skipped: number;
}

/**
 * EntityProvider interface.
 *
 * Providers are responsible for:
 * - Connecting to data sources (archive server, file, cache, etc.)
 * - Converting raw data to Entity shape
 * - Dropping records that lack the fields an entity requires
 *
 * @example
 * ```typescript
 * class FileProvider implements EntityProvider<ForumPost> {
 *     readonly id = "file-provider";
 *     readonly name = "File Provider";
 *
 *     async getEntities(options?: FetchOptions) {
 *         const rows = await readRows(this.path);
 *         const entities = rows.map(toPost).filter(isDefined);
 *         return { entities, skipped: rows.length - entities.length };
 *     }
 * }
 * ```
 */
export interface EntityProvider<T extends Entity<object> = Entity> {
    /** Unique identifier for this provider */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Optional description */
    readonly description?: string;

    /**
     * Initialize the provider.
     * Called once before the first fetch of a run.
     */
    initialize?(): Promise<void>;

    /**
     * Fetch the entities of a time window.
     *
     * @param options - Fetch options (since, until, refresh)
     * @returns Fetch result with entities and the skipped count
     */
    getEntities(options?: FetchOptions): Promise<FetchResult<T>>;

    /**
     * Shutdown the provider.
     * Called once when the run finishes, even after a failure.
     */
    shutdown?(): Promise<void>;
}
