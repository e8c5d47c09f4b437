/**
 * @fileoverview TriageEngine
 *
 * The core orchestration engine.
 *
 * Pipeline flow (one pass per registered domain):
 * 1. Entities pulled from the domain's provider for a time window
 * 2. Entities grouped into threads (connected components of their links)
 * 3. Each thread turned into a classified group by the domain
 * 4. The domain's filter selects the interesting groups
 * 5. Actions run, in order, for every accepted group
 *
 * Design principles:
 * - Domain-agnostic: knows nothing about mail, patches, etc.
 * - Plugin-based: providers, classifiers, filters and actions are plugins
 * - Observable: emits events at each lifecycle stage
 * - Single pass: a run ends when every accepted group was handled
 *
 * @module @mltriage/engine/engine/TriageEngine
 */

import type { Entity } from "../contracts/Entity.js";
import type { Classifier } from "../contracts/Classifier.js";
import type { ThreadLinkage } from "../contracts/ThreadLinkage.js";
import type { EntityProvider, FetchOptions } from "../contracts/EntityProvider.js";
import type { GroupFilter } from "../contracts/GroupFilter.js";
import type {
    ActionPlugin,
    ActionContext,
    ActionResult,
    PluginLogger,
} from "../contracts/ActionPlugin.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { buildThreads } from "../threading/buildThreads.js";
import { createConsoleLogger, type EngineLogger } from "./ConsoleLogger.js";

/**
 * Domain registration - all components needed for a domain.
 *
 * @typeParam TEntity - Entity type produced by the provider
 * @typeParam TCategory - Tag type produced by the classifier
 * @typeParam TGroup - Classified thread type produced by `createGroup`
 */
export interface DomainRegistration<TEntity extends Entity<object>, TCategory extends string, TGroup> {
    /** Unique identifier for this domain */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Entity provider for this domain */
    readonly provider: EntityProvider<TEntity>;

    /** How entities of this domain link into threads */
    readonly linkage: ThreadLinkage<TEntity>;

    /** Local (single-entity) classifier */
    readonly classifier: Classifier<TEntity, TCategory>;

    /**
     * Turn one thread into a classified group. The domain applies the
     * classifier and any thread-level refinement here.
     */
    createGroup(thread: readonly TEntity[], classifier: Classifier<TEntity, TCategory>): TGroup;

    /** Stable identifier of a group, for logs and events */
    identifyGroup(group: TGroup): string;

    /** Selects which groups reach the actions */
    readonly filter: GroupFilter<TGroup>;

    /** Optional ordering of accepted groups before actions run */
    compareGroups?(a: TGroup, b: TGroup): number;

    /** Action plugins to execute for accepted groups, in order */
    readonly actions: readonly ActionPlugin<TGroup>[];

    /** Optional domain-specific configuration */
    readonly config?: Record<string, unknown>;
}

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations (default: console at info level) */
    readonly logger?: EngineLogger;
}

/**
 * Outcome of one domain run.
 */
export interface RunReport<TGroup> {
    readonly domainId: string;
    readonly traceId: string;

    /** Entities returned by the provider */
    readonly fetched: number;

    /** Raw records the provider could not parse */
    readonly skipped: number;

    /** Threads built from the fetched entities */
    readonly threads: number;

    /** Groups accepted by the filter, in action order */
    readonly accepted: readonly TGroup[];

    /** Every action result, in execution order */
    readonly actionResults: readonly ActionResult[];

    /** Wall-clock duration in milliseconds */
    readonly duration: number;
}

/**
 * Generate a unique trace ID for a run.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * TriageEngine - The core orchestration engine.
 *
 * @example
 * ```typescript
 * const engine = new TriageEngine<MailMessage, Category, PatchSet>();
 *
 * engine.registerDomain({
 *     id          : "kernel-team",
 *     name        : "Kernel team mailing list",
 *     provider    : new ArchiveEntityProvider(options),
 *     linkage     : mailThreadLinkage,
 *     classifier  : new SimpleClassifier(),
 *     createGroup : (thread, classifier) => new PatchSet(thread, classifier),
 *     identifyGroup: (patchSet) => patchSet.id,
 *     filter      : new PatchFilter({ mode: "needs-acks" }),
 *     actions     : [savePatchSetAction],
 * });
 *
 * engine.eventBus.subscribe("thread:accepted", (event) => {
 *     console.log("Accepted:", event.data);
 * });
 *
 * const [report] = await engine.run({ since });
 * ```
 */
export class TriageEngine<TEntity extends Entity<object>, TCategory extends string, TGroup> {
    private readonly logger: EngineLogger;
    private readonly domains: Map<string, DomainRegistration<TEntity, TCategory, TGroup>> = new Map();

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: EngineConfig = {}) {
        this.eventBus = config.eventBus ?? new InMemoryEventBus();
        this.logger = config.logger ?? createConsoleLogger();
    }

    /**
     * Register a domain with the engine.
     *
     * @param domain - Domain registration with provider, classifier, filter and actions
     * @throws Error if domain with same ID already registered
     */
    registerDomain(domain: DomainRegistration<TEntity, TCategory, TGroup>): void {
        if (this.domains.has(domain.id)) {
            throw new Error(`Domain already registered: ${domain.id}`);
        }

        this.domains.set(domain.id, domain);
        this.logger.info("Domain registered", {
            domainId  : domain.id,
            name      : domain.name,
            classifier: domain.classifier.id,
            filter    : domain.filter.id,
            actions   : domain.actions.length,
        });
    }

    /**
     * Unregister a domain from the engine.
     *
     * @param domainId - The domain ID to unregister
     */
    unregisterDomain(domainId: string): void {
        if (this.domains.delete(domainId)) {
            this.logger.info("Domain unregistered", { domainId });
        }
    }

    /**
     * IDs of every registered domain, in registration order.
     */
    get domainIds(): string[] {
        return [...this.domains.keys()];
    }

    /**
     * Run every registered domain, one after the other.
     *
     * @param options - Time window handed to each provider
     * @returns One report per domain, in registration order
     * @throws The first provider error; later domains are not run
     */
    async run(options: FetchOptions = {}): Promise<RunReport<TGroup>[]> {
        const reports: RunReport<TGroup>[] = [];
        for (const domainId of this.domains.keys()) {
            reports.push(await this.runDomain(domainId, options));
        }
        return reports;
    }

    /**
     * Run a single domain.
     *
     * @param domainId - The domain to run
     * @param options - Time window handed to the provider
     * @returns Report for the run
     * @throws Error if the domain is unknown, or whatever the provider throws
     */
    async runDomain(domainId: string, options: FetchOptions = {}): Promise<RunReport<TGroup>> {
        const domain = this.domains.get(domainId);
        if (!domain) {
            throw new Error(`Unknown domain: ${domainId}`);
        }

        const traceId = generateTraceId();
        const startTime = Date.now();

        this.emit(createEvent("run:starting", {
            domainId,
            since: options.since?.toISOString(),
            until: options.until?.toISOString(),
        }, traceId));

        try {
            if (domain.provider.initialize) {
                await domain.provider.initialize();
            }

            const fetched = await domain.provider.getEntities(options);

            this.emit(createEvent("entities:fetched", {
                domainId,
                providerId: domain.provider.id,
                count     : fetched.entities.length,
                skipped   : fetched.skipped,
            }, traceId));

            this.logger.info("Fetched entities", {
                domainId,
                count  : fetched.entities.length,
                skipped: fetched.skipped,
            });

            const { accepted, threads } = this.classifyThreads(domain, fetched.entities, traceId);

            if (domain.compareGroups) {
                const compare = domain.compareGroups.bind(domain);
                accepted.sort(compare);
            }

            const actionResults: ActionResult[] = [];
            for (const group of accepted) {
                actionResults.push(...await this.executeActions(domain, group, traceId));
            }

            const report: RunReport<TGroup> = {
                domainId,
                traceId,
                fetched : fetched.entities.length,
                skipped : fetched.skipped,
                threads,
                accepted,
                actionResults,
                duration: Date.now() - startTime,
            };

            this.emit(createEvent("run:completed", {
                domainId,
                threads,
                accepted: accepted.length,
                failures: actionResults.filter(result => !result.success).length,
                duration: report.duration,
            }, traceId));

            this.logger.info("Run completed", {
                domainId,
                threads,
                accepted: accepted.length,
                duration: report.duration,
            });

            return report;
        }
        catch (error) {
            this.emit(createEvent("run:error", {
                domainId,
                error: errorMessage(error),
            }, traceId));

            this.logger.error("Run failed", {
                domainId,
                traceId,
                error: errorMessage(error),
            });
            throw error;
        }
        finally {
            await this.shutdownProvider(domain);
        }
    }

    /**
     * Build threads, classify each into a group and apply the filter.
     */
    private classifyThreads(
        domain: DomainRegistration<TEntity, TCategory, TGroup>,
        entities: readonly TEntity[],
        traceId: string
    ): { accepted: TGroup[]; threads: number } {
        const accepted: TGroup[] = [];
        let threads = 0;

        for (const thread of buildThreads(entities, domain.linkage)) {
            threads++;

            const group = domain.createGroup(thread, domain.classifier);
            const groupId = domain.identifyGroup(group);

            this.emit(createEvent("thread:classified", {
                domainId: domain.id,
                groupId,
                size    : thread.length,
            }, traceId));

            if (domain.filter.matches(group)) {
                accepted.push(group);
                this.emit(createEvent("thread:accepted", {
                    domainId: domain.id,
                    groupId,
                    filterId: domain.filter.id,
                }, traceId));
            }
        }

        this.logger.debug("Threads classified", {
            domainId: domain.id,
            threads,
            accepted: accepted.length,
        });

        return { accepted, threads };
    }

    /**
     * Execute every action of the domain for one accepted group.
     */
    private async executeActions(
        domain: DomainRegistration<TEntity, TCategory, TGroup>,
        group: TGroup,
        traceId: string
    ): Promise<ActionResult[]> {
        const groupId = domain.identifyGroup(group);
        const results: ActionResult[] = [];

        for (const action of domain.actions) {
            this.emit(createEvent("action:executing", {
                domainId: domain.id,
                groupId,
                actionId: action.id,
            }, traceId));

            try {
                const context: ActionContext<TGroup> = {
                    group,
                    groupId,
                    config: domain.config ?? {},
                    logger: this.createPluginLogger(domain.id, action.id, traceId),
                    traceId,
                };

                const result = await action.handle(context);
                results.push(result);

                this.emit(createEvent("action:executed", {
                    domainId: domain.id,
                    groupId,
                    actionId: action.id,
                    success : result.success,
                    error   : result.error,
                }, traceId));

                if (!result.success) {
                    this.logger.warn("Action failed", {
                        domainId: domain.id,
                        actionId: action.id,
                        groupId,
                        error   : result.error,
                    });
                }
            }
            catch (error) {
                results.push({
                    actionId: action.id,
                    success : false,
                    error   : errorMessage(error),
                });

                this.logger.error("Action execution error", {
                    domainId: domain.id,
                    actionId: action.id,
                    groupId,
                    error   : errorMessage(error),
                });

                this.emit(createEvent("action:error", {
                    domainId: domain.id,
                    groupId,
                    actionId: action.id,
                    error   : errorMessage(error),
                }, traceId));
            }
        }

        return results;
    }

    private async shutdownProvider(domain: DomainRegistration<TEntity, TCategory, TGroup>): Promise<void> {
        if (!domain.provider.shutdown) {
            return;
        }

        try {
            await domain.provider.shutdown();
        }
        catch (error) {
            this.logger.error("Provider shutdown error", {
                domainId: domain.id,
                error   : errorMessage(error),
            });
        }
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }

    /**
     * Create a logger for a plugin.
     */
    private createPluginLogger(domainId: string, pluginId: string, traceId: string): PluginLogger {
        return {
            debug: (msg, data) => this.logger.debug(`[${domainId}:${pluginId}] ${msg}`, { ...data, traceId }),
            info : (msg, data) => this.logger.info(`[${domainId}:${pluginId}] ${msg}`, { ...data, traceId }),
            warn : (msg, data) => this.logger.warn(`[${domainId}:${pluginId}] ${msg}`, { ...data, traceId }),
            error: (msg, data) => this.logger.error(`[${domainId}:${pluginId}] ${msg}`, { ...data, traceId }),
        };
    }
}
