/**
 * @fileoverview Domain barrel exports
 *
 * All domain-specific implementations for the mailing-list checker.
 *
 * @module domain
 */

export * from "./entities/index.js";
export * from "./utils/index.js";
export * from "./classifiers/index.js";
export * from "./threads/index.js";
export * from "./patchsets/index.js";
export * from "./filters/index.js";
export * from "./providers/index.js";
export * from "./actions/index.js";
export * from "./stats/index.js";
