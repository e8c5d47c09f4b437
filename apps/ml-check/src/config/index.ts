/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadConfig,
    loadConfigWithFallback,
    resolveCacheDatabase,
    ConfigError,
    DEFAULT_CONFIG,
    kCACHE_DATABASE,
    type MlCheckConfig,
} from "./loadConfig.js";

export {
    parseCliArgs,
    CliUsageError,
    kUSAGE,
    type CliOptions,
} from "./cliOptions.js";
