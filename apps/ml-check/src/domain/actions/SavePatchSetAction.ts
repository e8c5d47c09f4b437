/**
 * @fileoverview Save Patch Set Action
 *
 * Implements the ActionPlugin contract to write an accepted patch set
 * to disk, one directory per set:
 *
 * ```
 * <output>/<epoch patch name>/
 *     cover_letter          the epoch, rendered as a patch
 *     <patch name>.patch    one per PatchN
 *     series                paths of the .patch files, one per line
 *     summary.txt           review state of the set
 * ```
 *
 * @module domain/actions/SavePatchSetAction
 */

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { DateTime } from "luxon";
import type { ActionContext, ActionPlugin, ActionResult } from "@mltriage/engine";
import {
    formatThreadUrl,
    generatePatch,
    generatePatchName,
    type MailMessage,
} from "../entities/MailMessage.js";
import type { PatchSet } from "../patchsets/PatchSet.js";

/**
 * Configuration for SavePatchSetAction
 */
export interface SavePatchSetActionConfig {
    /** Directory receiving one sub-directory per patch set */
    readonly outputDirectory: string;

    /** Thread URL template for the summary's link */
    readonly threadUrl: string;

    /** Clock used for the summary's age (default: current UTC time) */
    readonly now?: () => DateTime;
}

/**
 * Directory a patch set is written to, or null when it has no epoch
 * to name it after.
 */
export function patchSetDirectory(outputDirectory: string, patchSet: PatchSet): string | null {
    const epoch = patchSet.epochPatch;
    const name = epoch ? generatePatchName(epoch) : null;
    return name === null ? null : join(outputDirectory, name);
}

/**
 * Render the summary.txt of a patch set.
 */
export function renderSummary(patchSet: PatchSet, epoch: MailMessage, threadUrl: string, now: DateTime): string {
    const ageDays = Math.floor(now.diff(epoch.metadata.timestamp, "days").days);

    return [
        epoch.metadata.subject,
        `rfc822msgid: ${epoch.id}`,
        `owner: ${epoch.metadata.sender ?? ""}`,
        `link: ${formatThreadUrl(epoch, threadUrl)}`,
        `age: ${ageDays} days`,
        `size: ${patchSet.patches.length} patches`,
        `acks: ${patchSet.acks.length}`,
        `naks: ${patchSet.naks.length}`,
        `applied: ${patchSet.applieds.length > 0}`,
        "",
    ].join("\n");
}

/**
 * Save Patch Set Action
 *
 * @example
 * ```typescript
 * const action = new SavePatchSetAction({
 *     outputDirectory: "out",
 *     threadUrl      : config.archive.threadUrl,
 * });
 * ```
 */
export class SavePatchSetAction implements ActionPlugin<PatchSet> {
    readonly id          = "save-patch-set";
    readonly name        = "Save Patch Set";
    readonly description = "Writes the patches, series and review summary of a patch set to disk";

    private readonly outputDirectory: string;
    private readonly threadUrl: string;
    private readonly now: () => DateTime;

    constructor(config: SavePatchSetActionConfig) {
        this.outputDirectory = config.outputDirectory;
        this.threadUrl       = config.threadUrl;
        this.now             = config.now ?? (() => DateTime.utc());
    }

    async handle(context: ActionContext<PatchSet>): Promise<ActionResult> {
        const { group: patchSet, logger } = context;

        const epoch = patchSet.epochPatch;
        const patchDir = patchSetDirectory(this.outputDirectory, patchSet);
        if (epoch === null || patchDir === null) {
            return {
                actionId: this.id,
                success : false,
                error   : "Patch set has no nameable epoch patch",
            };
        }

        mkdirSync(patchDir, { recursive: true });
        writeFileSync(join(patchDir, "cover_letter"), generatePatch(epoch), "utf-8");

        const series: string[] = [];
        for (const patch of patchSet.patches) {
            const name = generatePatchName(patch);
            if (name === null) {
                logger.warn("Skipping patch without a subject", { messageId: patch.id });
                continue;
            }

            const patchFile = join(patchDir, `${name}.patch`);
            writeFileSync(patchFile, generatePatch(patch), "utf-8");
            series.push(patchFile);
        }

        writeFileSync(
            join(patchDir, "series"),
            series.map(patchFile => `${patchFile}\n`).join(""),
            "utf-8"
        );

        writeFileSync(
            join(patchDir, "summary.txt"),
            renderSummary(patchSet, epoch, this.threadUrl, this.now()),
            "utf-8"
        );

        logger.info("Patch set saved", {
            patchDir,
            patches: series.length,
        });

        return {
            actionId: this.id,
            success : true,
            data    : {
                patchDir,
                patches: series.length,
            },
        };
    }
}
