/**
 * Patch-style checker runner
 *
 * Runs an external checker (a checkpatch.pl-style script) on one
 * patch file and captures what it prints.
 */

import { spawn } from "child_process";
import { expandHome } from "../../../domain/utils/paths.js";

/**
 * Result of one checker run
 * @property {number | null} exitCode - Process exit code (null when it could not start)
 * @property {string} stdout - What the checker printed to stdout
 * @property {string} stderr - What the checker printed to stderr, or the spawn error
 */
export interface CheckpatchResult {
    exitCode: number | null;
    stdout: string;
    stderr: string;
}

export type CheckpatchRunner = (checkerPath: string, patchPath: string) => Promise<CheckpatchResult>;

const kANSI_COLOR = /\u001b\[\d+(?:;\d+)*m/g;

/**
 * Remove ANSI color sequences.
 */
export function stripAnsi(text: string): string {
    return text.replace(kANSI_COLOR, "");
}

/**
 * Run the checker on a patch file.
 *
 * Never rejects: a checker that cannot be started yields a null exit
 * code and the error message on stderr.
 *
 * @param checkerPath - Path to the checker executable ("~" allowed)
 * @param patchPath - Patch file to check
 * @param timeoutMs - Kill the checker after this long (default: 2 minutes)
 *
 * @example
 * const result = await runCheckpatch("~/bin/checkpatch", "out/Fix_build/Fix_build.patch");
 * console.log(stripAnsi(result.stdout));
 */
export function runCheckpatch(
    checkerPath: string,
    patchPath: string,
    timeoutMs: number = 120_000
): Promise<CheckpatchResult> {
    return new Promise((resolve) => {
        const proc = spawn(expandHome(checkerPath), [patchPath], { timeout: timeoutMs });

        let stdout = "";
        let stderr = "";

        proc.stdout.on("data", (data: Buffer) => {
            stdout += data.toString();
        });

        proc.stderr.on("data", (data: Buffer) => {
            stderr += data.toString();
        });

        proc.on("close", (code) => {
            resolve({ exitCode: code, stdout, stderr });
        });

        proc.on("error", (err) => {
            resolve({ exitCode: null, stdout, stderr: err.message });
        });
    });
}
