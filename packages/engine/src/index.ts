/**
 * @fileoverview Triage Engine
 *
 * Domain-agnostic threading, classification and triage engine.
 *
 * The engine provides:
 * - Window-based entity pulls from providers
 * - Union-find threading over reply/reference links
 * - Per-thread group classification supplied by the domain
 * - Group filtering and ordered action execution
 *
 * @module @mltriage/engine
 * @example
 * ```typescript
 * import {
 *     type Entity,
 *     type Classifier,
 *     type ActionPlugin,
 *     type EntityProvider,
 *     TriageEngine,
 * } from "@mltriage/engine";
 *
 * // Define domain entities, classifier, linkage, filter and actions
 * // Register them as a domain
 * // The engine runs the pipeline once per call to run()
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

// Entity
export type { Entity } from "./contracts/index.js";

// Classifier
export type { Classifier } from "./contracts/index.js";
export { isClassifier } from "./contracts/index.js";

// Thread linkage
export type { ThreadLinkage } from "./contracts/index.js";

// EntityProvider
export type {
    EntityProvider,
    FetchOptions,
    FetchResult,
} from "./contracts/index.js";

// Group filter
export type { GroupFilter } from "./contracts/index.js";

// Action Plugin
export type {
    ActionPlugin,
    ActionContext,
    ActionResult,
    PluginLogger,
} from "./contracts/index.js";
export { isActionPlugin } from "./contracts/index.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./contracts/index.js";
export { createEvent } from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus } from "./impl/index.js";

// ============================================================================
// Threading exports
// ============================================================================

export { DisjointSet, buildThreads } from "./threading/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    TriageEngine,
    createConsoleLogger,
    isLogLevel,
    silentLogger,
    type DomainRegistration,
    type EngineConfig,
    type EngineLogger,
    type LogLevel,
    type RunReport,
} from "./engine/index.js";
