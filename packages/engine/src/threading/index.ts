/**
 * @fileoverview Threading barrel exports
 *
 * @module @mltriage/engine/threading
 */

export { DisjointSet } from "./DisjointSet.js";
export { buildThreads } from "./buildThreads.js";
