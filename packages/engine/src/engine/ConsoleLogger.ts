/**
 * @fileoverview Console logger
 *
 * Default EngineLogger implementation: `[LEVEL] message` lines through
 * console, with structured data passed as a second argument.
 *
 * @module @mltriage/engine/engine/ConsoleLogger
 */

/**
 * Logger interface for the engine.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const kLEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info : 1,
    warn : 2,
    error: 3,
};

/**
 * Type guard for log level names.
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && value in kLEVEL_ORDER;
}

/**
 * Create a console logger that drops messages below `minLevel`.
 *
 * @param minLevel - Lowest level that is written (default: "info")
 * @returns EngineLogger writing through console
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger(verbose ? "debug" : "info");
 * logger.info("Fetched archive", { month: "2022-11" });
 * // [INFO] Fetched archive { month: '2022-11' }
 * ```
 */
export function createConsoleLogger(minLevel: LogLevel = "info"): EngineLogger {
    const enabled = (level: LogLevel): boolean => kLEVEL_ORDER[level] >= kLEVEL_ORDER[minLevel];

    return {
        debug: (msg, data) => {
            if (enabled("debug")) console.debug(`[DEBUG] ${msg}`, data ?? "");
        },
        info: (msg, data) => {
            if (enabled("info")) console.info(`[INFO] ${msg}`, data ?? "");
        },
        warn: (msg, data) => {
            if (enabled("warn")) console.warn(`[WARN] ${msg}`, data ?? "");
        },
        error: (msg, data) => {
            if (enabled("error")) console.error(`[ERROR] ${msg}`, data ?? "");
        },
    };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: EngineLogger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};
