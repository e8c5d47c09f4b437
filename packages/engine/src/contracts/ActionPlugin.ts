/**
 * Action Plugin Contract
 *
 * Plugins that execute side effects for every group the domain's
 * filter accepted (write files, run checkers, print reports).
 *
 * Design principles:
 * - Idempotent: Safe to execute multiple times with same result
 * - Ordered: Actions run in registration order, so a later action may
 *   consume what an earlier one wrote
 * - Focused: Actions only execute, they do not classify or filter
 */

/**
 * Logger interface handed to plugins.
 */
export interface PluginLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Context provided to action plugins during execution.
 *
 * @typeParam TGroup - The classified group type
 */
export interface ActionContext<TGroup> {
    /**
     * The accepted group being acted upon (read-only).
     */
    readonly group: TGroup;

    /**
     * Identifier the domain gave this group (used in logs and events).
     */
    readonly groupId: string;

    /**
     * Read-only configuration of the domain.
     */
    readonly config: Readonly<Record<string, unknown>>;

    /**
     * Logger for the plugin.
     */
    readonly logger: PluginLogger;

    /**
     * Unique trace ID for this run.
     */
    readonly traceId: string;
}

/**
 * Result of executing an action.
 */
export interface ActionResult {
    /**
     * Identifier of the action that was executed.
     */
    readonly actionId: string;

    /**
     * Whether the action succeeded.
     */
    readonly success: boolean;

    /**
     * Error message if the action failed.
     */
    readonly error?: string;

    /**
     * Optional output data from the action.
     */
    readonly data?: Record<string, unknown>;
}

/**
 * Action Plugin interface.
 *
 * Rules:
 * - Must be idempotent
 * - Must not reclassify groups
 * - Reports failure through ActionResult rather than throwing where it can
 *
 * @example
 * ```typescript
 * const logAction: ActionPlugin<Thread> = {
 *     id: "log-thread",
 *     async handle(context) {
 *         context.logger.info("Accepted", { groupId: context.groupId });
 *         return { actionId: this.id, success: true };
 *     }
 * };
 * ```
 */
export interface ActionPlugin<TGroup> {
    /**
     * Unique identifier for this action.
     */
    readonly id: string;

    /**
     * Optional human-readable name.
     */
    readonly name?: string;

    /**
     * Optional description of what this action does.
     */
    readonly description?: string;

    /**
     * Execute the action for one accepted group.
     *
     * @param context - Execution context (group, config, logger, traceId)
     * @returns Result of the action execution
     */
    handle(context: ActionContext<TGroup>): Promise<ActionResult>;
}

/**
 * Type guard to check if an object is an ActionPlugin.
 *
 * @param obj - The object to check
 * @returns True if the object implements ActionPlugin
 */
export function isActionPlugin(obj: unknown): obj is ActionPlugin<unknown> {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "handle" in obj &&
        typeof obj.handle === "function"
    );
}
