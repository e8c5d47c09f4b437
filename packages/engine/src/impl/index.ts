/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @mltriage/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
