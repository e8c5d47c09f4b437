/**
 * @fileoverview Print Summary Action
 *
 * Implements the ActionPlugin contract to print one machine-readable
 * line per accepted patch set:
 *
 * `[YYYY.MM] <thread-url> <subject>`
 *
 * @module domain/actions/PrintSummaryAction
 */

import type { ActionContext, ActionPlugin, ActionResult } from "@mltriage/engine";
import { shortSummary } from "../entities/MailMessage.js";
import type { PatchSet } from "../patchsets/PatchSet.js";

/**
 * Configuration for PrintSummaryAction
 */
export interface PrintSummaryActionConfig {
    /** Thread URL template */
    readonly threadUrl: string;

    /** Line sink (default: stdout) */
    readonly write?: (line: string) => void;
}

/**
 * Print Summary Action
 */
export class PrintSummaryAction implements ActionPlugin<PatchSet> {
    readonly id          = "print-summary";
    readonly name        = "Print Summary";
    readonly description = "Prints a one-line summary of each accepted patch set";

    private readonly threadUrl: string;
    private readonly write: (line: string) => void;

    constructor(config: PrintSummaryActionConfig) {
        this.threadUrl = config.threadUrl;
        this.write     = config.write ?? ((line) => {
            process.stdout.write(`${line}\n`);
        });
    }

    async handle(context: ActionContext<PatchSet>): Promise<ActionResult> {
        const epoch = context.group.epochPatch;
        if (epoch === null) {
            return {
                actionId: this.id,
                success : false,
                error   : "Patch set has no epoch patch",
            };
        }

        const line = shortSummary(epoch, this.threadUrl);
        this.write(line);

        return {
            actionId: this.id,
            success : true,
            data    : { line },
        };
    }
}
