/**
 * @fileoverview ml-check command
 *
 * Wires the mailing-list domain (archive provider, classifier, patch
 * sets, filter, actions) into the TriageEngine and runs it once.
 *
 * @module cli
 */

import { mkdirSync, rmSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { DateTime } from "luxon";

// Engine
import {
    TriageEngine,
    createConsoleLogger,
    type ActionPlugin,
    type DomainRegistration,
    type EngineLogger,
    type EntityProvider,
} from "@mltriage/engine";

// Domain components
import {
    ArchiveEntityProvider,
    CheckPatchAction,
    PatchFilter,
    PatchSet,
    PrintSummaryAction,
    SavePatchSetAction,
    SimpleClassifier,
    comparePatchSets,
    expandHome,
    generateStats,
    mailThreadLinkage,
    type Category,
    type MailMessage,
} from "./domain/index.js";

// Adapters
import { ArchiveCache, ArchiveClient } from "./adapters/archive/services/index.js";

// Config
import {
    CliUsageError,
    kUSAGE,
    loadConfigWithFallback,
    parseCliArgs,
    resolveCacheDatabase,
    type CliOptions,
    type MlCheckConfig,
} from "./config/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const kDEFAULT_CONFIG_PATH = join(__dirname, "..", "config", "ml-check.yml");

export type MailDomain = DomainRegistration<MailMessage, Category, PatchSet>;

/**
 * Everything the mail domain is built from
 */
export interface MailDomainOptions {
    readonly config: MlCheckConfig;
    readonly options: CliOptions;
    readonly provider: EntityProvider<MailMessage>;
    /** Start of the review window */
    readonly since: DateTime;
    /** Summary line sink (default: stdout) */
    readonly write?: (line: string) => void;
}

/**
 * Create the mailing-list domain registration for the TriageEngine.
 *
 * Actions run in this order for every accepted patch set:
 * save to disk, check the saved patches (when a checker is set), then
 * print the summary line.
 */
export function createMailDomain({ config, options, provider, since, write }: MailDomainOptions): MailDomain {
    const outputDirectory = expandHome(options.patchOutput);

    const actions: ActionPlugin<PatchSet>[] = [
        new SavePatchSetAction({
            outputDirectory,
            threadUrl: config.archive.threadUrl,
        }),
    ];

    if (options.checkpatchPath) {
        actions.push(new CheckPatchAction({
            checkerPath: options.checkpatchPath,
            outputDirectory,
        }));
    }

    actions.push(new PrintSummaryAction({
        threadUrl: config.archive.threadUrl,
        write,
    }));

    return {
        id           : "kernel-team",
        name         : "Kernel team mailing list",
        provider,
        linkage      : mailThreadLinkage,
        classifier   : new SimpleClassifier(),
        createGroup  : (thread, classifier) => PatchSet.fromThread(thread, classifier),
        identifyGroup: (patchSet) => patchSet.id,
        filter       : new PatchFilter({
            mode        : options.mode,
            requiredAcks: options.requiredAcks,
            since,
            ignoreAckers: options.ignoreAckers,
        }),
        compareGroups: comparePatchSets,
        actions,
        config       : {
            outputDirectory,
            mode: options.mode,
        },
    };
}

/**
 * Subscribe console reporting to engine events.
 */
function observe(engine: TriageEngine<MailMessage, Category, PatchSet>, logger: EngineLogger): void {
    engine.eventBus.subscribe("thread:accepted", (event) => {
        logger.debug("Patch set accepted", event.data);
    });

    engine.eventBus.subscribe("action:error", (event) => {
        logger.error("Action threw", event.data);
    });
}

/**
 * Run ml-check.
 *
 * @param argv - Arguments after the script name
 * @param env - Environment
 * @returns Process exit code
 */
export async function run(
    argv: readonly string[],
    env: Readonly<Record<string, string | undefined>> = process.env,
    configPath: string = kDEFAULT_CONFIG_PATH
): Promise<number> {
    let logger = createConsoleLogger("info");
    const config = loadConfigWithFallback(configPath, logger);

    let options: CliOptions;
    try {
        options = parseCliArgs(argv, config.defaults, env);
    }
    catch (error) {
        if (error instanceof CliUsageError) {
            console.error(`ml-check: ${error.message}\n\n${kUSAGE}`);
            return 1;
        }
        throw error;
    }

    if (options.help) {
        console.log(kUSAGE);
        return 0;
    }

    if (options.verbose) {
        logger = createConsoleLogger("debug");
    }
    logger.debug("Options", { ...options });

    try {
        const now = DateTime.utc();
        const since = now.minus({ days: options.daysBack });

        const provider = new ArchiveEntityProvider({
            source    : new ArchiveClient({ monthlyUrl: config.archive.monthlyUrl }),
            cache     : new ArchiveCache(resolveCacheDatabase(config, env)),
            logger,
        });

        if (options.clearCache) {
            await provider.initialize();
            provider.clearCache();
        }

        // Output directory always starts empty
        const outputDirectory = expandHome(options.patchOutput);
        rmSync(outputDirectory, { recursive: true, force: true });
        mkdirSync(outputDirectory, { recursive: true });

        const engine = new TriageEngine<MailMessage, Category, PatchSet>({ logger });
        observe(engine, logger);
        engine.registerDomain(createMailDomain({ config, options, provider, since }));

        const reports = await engine.run({
            since: since.toJSDate(),
            until: now.toJSDate(),
        });

        if (options.showStats) {
            const stats = generateStats(reports.flatMap(report => report.accepted), now);
            if (stats) {
                console.log(JSON.stringify(stats, null, 4));
            }
        }

        return 0;
    }
    catch (error) {
        logger.error("ml-check failed", {
            error: error instanceof Error ? error.message : String(error),
        });
        return 1;
    }
}
