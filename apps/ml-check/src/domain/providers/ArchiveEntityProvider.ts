/**
 * @fileoverview Archive Entity Provider
 *
 * Implements the EntityProvider contract for the mailing-list archive.
 * Loads every month of the requested window from the cache or the
 * archive server and parses it into MailMessage entities.
 *
 * Months before the current one are stable: once cached they are never
 * downloaded again. The current month is active and is downloaded on
 * every run.
 *
 * @module domain/providers/ArchiveEntityProvider
 */

import { DateTime } from "luxon";
import {
    silentLogger,
    type Classifier,
    type EngineLogger,
    type EntityProvider,
    type FetchOptions,
    type FetchResult,
} from "@mltriage/engine";
import type { MonthSource } from "../../adapters/archive/services/archive-client.js";
import type { MonthCache } from "../../adapters/archive/services/archive-cache.js";
import type { Category } from "../entities/Category.js";
import type { MailMessage } from "../entities/MailMessage.js";
import { readMailbox } from "../utils/mbox.js";
import { isSameMonth, monthKey, periodicMailSteps, type MonthStep } from "../utils/months.js";

/**
 * Configuration for the archive entity provider
 */
export interface ArchiveProviderConfig {
    /** Where monthly archives are downloaded from */
    readonly source: MonthSource;

    /** Where downloaded archives are kept */
    readonly cache: MonthCache;

    /**
     * Gives every parsed message its initial category. Only for callers
     * that use the provider on its own: the engine reclassifies every
     * thread, so the triage run leaves this unset.
     */
    readonly classifier?: Classifier<MailMessage, Category>;

    readonly logger?: EngineLogger;

    /** Clock (default: current UTC time) */
    readonly now?: () => DateTime;
}

/**
 * Archive Entity Provider
 *
 * @example
 * ```typescript
 * const provider = new ArchiveEntityProvider({
 *     source    : new ArchiveClient({ monthlyUrl }),
 *     cache     : new ArchiveCache("~/.cache/ml-check/archive.db"),
 *     classifier: new SimpleClassifier(),
 * });
 *
 * await provider.initialize();
 * const { entities, skipped } = await provider.getEntities({
 *     since: DateTime.utc().minus({ days: 14 }).toJSDate(),
 * });
 * await provider.shutdown();
 * ```
 */
export class ArchiveEntityProvider implements EntityProvider<MailMessage> {
    readonly id          = "archive-provider";
    readonly name        = "Mailing List Archive Provider";
    readonly description = "Provides messages from the monthly mailing-list archive files";

    private readonly source: MonthSource;
    private readonly cache: MonthCache;
    private readonly classifier?: Classifier<MailMessage, Category>;
    private readonly logger: EngineLogger;
    private readonly now: () => DateTime;
    private initialized: boolean = false;

    constructor(config: ArchiveProviderConfig) {
        this.source     = config.source;
        this.cache      = config.cache;
        this.classifier = config.classifier;
        this.logger     = config.logger ?? silentLogger;
        this.now        = config.now ?? (() => DateTime.utc());
    }

    /**
     * Open the cache.
     */
    async initialize(): Promise<void> {
        if (this.initialized) {
            return;
        }

        this.cache.open();
        this.initialized = true;
    }

    /**
     * Fetch every message of the months touched by [since, until].
     *
     * Messages are not trimmed to the window: replies that arrived
     * after it still count towards review.
     *
     * @param options - Window (default: the current month only) and refresh flag
     * @returns De-duplicated messages and the number of malformed mails
     */
    async getEntities(options: FetchOptions = {}): Promise<FetchResult<MailMessage>> {
        if (!this.initialized) {
            throw new Error("Provider not initialized. Call initialize() first.");
        }

        const now = this.now();
        const until = options.until ? DateTime.fromJSDate(options.until) : now;
        const since = options.since ? DateTime.fromJSDate(options.since) : until;

        const byId = new Map<string, MailMessage>();
        let skipped = 0;

        for (const step of periodicMailSteps(since, until)) {
            const text = await this.loadMonth(step, now, options.refresh ?? false);
            if (text === null) {
                continue;
            }

            const mailbox = await readMailbox(text, {
                classifier: this.classifier,
                logger    : this.logger,
            });

            // Last writer wins on duplicate Message-Ids
            for (const message of mailbox.messages) {
                byId.set(message.id, message);
            }
            skipped += mailbox.skipped;

            this.logger.debug("Parsed archive month", {
                month   : monthKey(step),
                messages: mailbox.messages.length,
                skipped : mailbox.skipped,
            });
        }

        return {
            entities: [...byId.values()],
            skipped,
        };
    }

    /**
     * Close the cache.
     */
    async shutdown(): Promise<void> {
        this.cache.close();
        this.initialized = false;
    }

    /**
     * Remove every cached month.
     *
     * @returns Number of months removed
     */
    clearCache(): number {
        const removed = this.cache.clear();
        this.logger.info("Cache cleared", { months: removed });
        return removed;
    }

    private async loadMonth(step: MonthStep, now: DateTime, refresh: boolean): Promise<string | null> {
        const key = monthKey(step);
        const active = isSameMonth(step, now);
        const cached = this.cache.get(key);

        if (cached !== null && !active && !refresh) {
            this.logger.debug("Using cached archive month", { month: key });
            return cached;
        }

        this.logger.info("Downloading archive month", { month: key });
        const text = await this.source.fetchMonth(step);

        if (text === null) {
            this.logger.warn("Archive month not published", { month: key });
            return cached;
        }

        this.cache.put(key, text);
        return text;
    }
}
