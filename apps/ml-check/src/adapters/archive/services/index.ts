/**
 * @fileoverview Archive services barrel exports
 *
 * @module adapters/archive/services
 */

export {
    ArchiveClient,
    ArchiveFetchError,
    formatArchiveUrl,
    type ArchiveClientOptions,
    type MonthSource,
} from "./archive-client.js";

export {
    ArchiveCache,
    kIN_MEMORY,
    type MonthCache,
} from "./archive-cache.js";
