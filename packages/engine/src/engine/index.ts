/**
 * @fileoverview Engine barrel exports
 *
 * @module @mltriage/engine/engine
 */

export {
    TriageEngine,
    type DomainRegistration,
    type EngineConfig,
    type RunReport,
} from "./TriageEngine.js";

export {
    createConsoleLogger,
    isLogLevel,
    silentLogger,
    type EngineLogger,
    type LogLevel,
} from "./ConsoleLogger.js";
