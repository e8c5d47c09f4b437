/**
 * @fileoverview Contract barrel exports
 *
 * All domain-agnostic interfaces and types that define
 * the triage engine contract.
 *
 * @module @mltriage/engine/contracts
 */

// Entity contract
export type { Entity } from "./Entity.js";

// Classifier contract
export type { Classifier } from "./Classifier.js";
export { isClassifier } from "./Classifier.js";

// Thread linkage contract
export type { ThreadLinkage } from "./ThreadLinkage.js";

// EntityProvider contract
export type {
    EntityProvider,
    FetchOptions,
    FetchResult,
} from "./EntityProvider.js";

// Group filter contract
export type { GroupFilter } from "./GroupFilter.js";

// Action plugin contract
export type {
    ActionPlugin,
    ActionContext,
    ActionResult,
    PluginLogger,
} from "./ActionPlugin.js";
export { isActionPlugin } from "./ActionPlugin.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
