/**
 * @fileoverview Check Patch Action
 *
 * Implements the ActionPlugin contract to run a patch-style checker
 * over the .patch files SavePatchSetAction wrote, collecting the
 * checker's output in `check-patch.txt` beside them.
 *
 * Register it after SavePatchSetAction.
 *
 * @module domain/actions/CheckPatchAction
 */

import { existsSync, readdirSync, writeFileSync } from "fs";
import { join } from "path";
import type { ActionContext, ActionPlugin, ActionResult } from "@mltriage/engine";
import {
    runCheckpatch,
    stripAnsi,
    type CheckpatchRunner,
} from "../../adapters/checkpatch/services/checkpatch.js";
import type { PatchSet } from "../patchsets/PatchSet.js";
import { patchSetDirectory } from "./SavePatchSetAction.js";

export const kCHECK_PATCH_RESULTS = "check-patch.txt";

/**
 * Configuration for CheckPatchAction
 */
export interface CheckPatchActionConfig {
    /** Checker executable ("~" allowed) */
    readonly checkerPath: string;

    /** Same output directory SavePatchSetAction writes to */
    readonly outputDirectory: string;

    /** Runs the checker (default: child process) */
    readonly runner?: CheckpatchRunner;
}

/**
 * Check Patch Action
 *
 * @example
 * ```typescript
 * const actions = [
 *     new SavePatchSetAction({ outputDirectory: "out", threadUrl }),
 *     new CheckPatchAction({ checkerPath: "~/bin/checkpatch", outputDirectory: "out" }),
 * ];
 * ```
 */
export class CheckPatchAction implements ActionPlugin<PatchSet> {
    readonly id          = "check-patch";
    readonly name        = "Check Patch";
    readonly description = "Runs a patch-style checker over every saved patch of a patch set";

    private readonly checkerPath: string;
    private readonly outputDirectory: string;
    private readonly runner: CheckpatchRunner;

    constructor(config: CheckPatchActionConfig) {
        this.checkerPath     = config.checkerPath;
        this.outputDirectory = config.outputDirectory;
        this.runner          = config.runner ?? ((checkerPath, patchPath) => runCheckpatch(checkerPath, patchPath));
    }

    async handle(context: ActionContext<PatchSet>): Promise<ActionResult> {
        const { group: patchSet, logger } = context;

        const patchDir = patchSetDirectory(this.outputDirectory, patchSet);
        if (patchDir === null || !existsSync(patchDir)) {
            return {
                actionId: this.id,
                success : false,
                error   : "Patch set has not been saved",
            };
        }

        const patchFiles = readdirSync(patchDir)
            .filter(file => file.endsWith(".patch"))
            .sort()
            .map(file => join(patchDir, file));

        let output = "";
        let failures = 0;
        for (const patchFile of patchFiles) {
            const result = await this.runner(this.checkerPath, patchFile);
            output += stripAnsi(result.stderr) + stripAnsi(result.stdout);
            if (result.exitCode !== 0) {
                failures++;
            }
        }

        const resultsFile = join(patchDir, kCHECK_PATCH_RESULTS);
        writeFileSync(resultsFile, output, "utf-8");

        logger.info("Patches checked", {
            patchDir,
            checked: patchFiles.length,
            failures,
        });

        return {
            actionId: this.id,
            success : true,
            data    : {
                resultsFile,
                checked: patchFiles.length,
                failures,
            },
        };
    }
}
