/**
 * @fileoverview Checkpatch services barrel exports
 *
 * @module adapters/checkpatch/services
 */

export {
    runCheckpatch,
    stripAnsi,
    type CheckpatchResult,
    type CheckpatchRunner,
} from "./checkpatch.js";
