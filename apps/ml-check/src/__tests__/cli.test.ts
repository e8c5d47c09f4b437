/**
 * @fileoverview Tests for the ml-check command wiring
 *
 * Runs the mail domain through a real TriageEngine with an in-memory
 * provider; nothing is downloaded.
 *
 * @module __tests__/cli
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readdirSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { DateTime } from "luxon";
import { TriageEngine, silentLogger, type EntityProvider } from "@mltriage/engine";
import { createMailDomain, run } from "../cli.js";
import { DEFAULT_CONFIG } from "../config/loadConfig.js";
import { parseCliArgs } from "../config/cliOptions.js";
import type { Category } from "../domain/entities/Category.js";
import type { MailMessage } from "../domain/entities/MailMessage.js";
import type { PatchSet } from "../domain/patchsets/PatchSet.js";
import { kDIFF_BODY, makeMessage } from "./helpers.js";

function staticProvider(messages: MailMessage[]): EntityProvider<MailMessage> {
    return {
        id         : "static",
        name       : "Static",
        getEntities: async () => ({ entities: messages, skipped: 0 }),
    };
}

const kMESSAGES = [
    makeMessage({ id: "<one@example.com>", subject: "[PATCH] Fix build", body: kDIFF_BODY, at: "2022-11-10T10:00:00Z" }),
    makeMessage({
        id       : "<one-ack@example.com>",
        subject  : "ACK: [PATCH] Fix build",
        inReplyTo: "<one@example.com>",
        at       : "2022-11-11T10:00:00Z",
    }),
    makeMessage({ id: "<two@example.com>", subject: "[PATCH] Tidy docs", body: kDIFF_BODY, at: "2022-11-05T10:00:00Z" }),
    makeMessage({ id: "<old@example.com>", subject: "[PATCH] Ancient fix", body: kDIFF_BODY, at: "2022-09-01T10:00:00Z" }),
    makeMessage({ id: "<chat@example.com>", subject: "Meeting notes", at: "2022-11-12T10:00:00Z" }),
];

describe("createMailDomain", () => {
    let outputDirectory: string;

    beforeEach(() => {
        outputDirectory = mkdtempSync(join(tmpdir(), "ml-check-cli-"));
    });

    afterEach(() => {
        rmSync(outputDirectory, { recursive: true, force: true });
    });

    // Scenario: needs-acks run prints recent, under-acked patch sets oldest first
    it("should save and print the patch sets that need acks", async () => {
        const lines: string[] = [];
        const options = parseCliArgs(["-p", outputDirectory], DEFAULT_CONFIG.defaults, {});
        const engine = new TriageEngine<MailMessage, Category, PatchSet>({ logger: silentLogger });

        engine.registerDomain(createMailDomain({
            config  : DEFAULT_CONFIG,
            options,
            provider: staticProvider(kMESSAGES),
            since   : DateTime.fromISO("2022-11-01T00:00:00Z"),
            write   : (line) => lines.push(line),
        }));

        const [report] = await engine.run();

        expect(report.threads).toBe(4);
        expect(report.accepted.map(patchSet => patchSet.id)).toEqual(["<two@example.com>", "<one@example.com>"]);
        expect(lines).toEqual([
            "[2022.11] https://lists.ubuntu.com/archives/kernel-team/2022-November/thread.html [PATCH] Tidy docs",
            "[2022.11] https://lists.ubuntu.com/archives/kernel-team/2022-November/thread.html [PATCH] Fix build",
        ]);
        expect(readdirSync(outputDirectory).sort()).toEqual([
            "PATCH__Fix_build___one_example_com",
            "PATCH__Tidy_docs___two_example_com",
        ]);
    });

    // Scenario: Action order with and without a checker
    it("should add the checker between saving and printing when configured", () => {
        const provider = staticProvider([]);
        const since = DateTime.fromISO("2022-11-01T00:00:00Z");

        const without = createMailDomain({
            config : DEFAULT_CONFIG,
            options: parseCliArgs([], DEFAULT_CONFIG.defaults, {}),
            provider,
            since,
        });
        const withChecker = createMailDomain({
            config : DEFAULT_CONFIG,
            options: parseCliArgs(["-c", "/opt/checkpatch"], DEFAULT_CONFIG.defaults, {}),
            provider,
            since,
        });

        expect(without.actions.map(action => action.id)).toEqual(["save-patch-set", "print-summary"]);
        expect(withChecker.actions.map(action => action.id)).toEqual(["save-patch-set", "check-patch", "print-summary"]);
    });
});

describe("run", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    // Scenario: --help
    it("should print usage and exit 0 for --help", async () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});

        expect(await run(["--help"], {})).toBe(0);
        expect(log).toHaveBeenCalledTimes(1);
        expect(String(log.mock.calls[0][0])).toMatch(/^Usage: ml-check \[options\]/);
    });

    // Scenario: Bad option
    it("should report usage errors and exit 1", async () => {
        const error = vi.spyOn(console, "error").mockImplementation(() => {});

        expect(await run(["--mode", "later"], {})).toBe(1);
        expect(String(error.mock.calls[0][0])).toMatch(/^ml-check: --mode must be one of /);
    });
});
