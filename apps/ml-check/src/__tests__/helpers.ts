/**
 * @fileoverview Test fixtures shared by the ml-check tests
 *
 * @module __tests__/helpers
 */

import { DateTime } from "luxon";
import type { ActionContext } from "@mltriage/engine";
import { silentLogger } from "@mltriage/engine";
import { Category } from "../domain/entities/Category.js";
import { createMailMessage, type MailMessage } from "../domain/entities/MailMessage.js";

export const kDIFF_BODY = [
    "Fix the build on arm64.",
    "",
    "Signed-off-by: Jane Dev <jane@example.com>",
    "---",
    "diff --git a/Makefile b/Makefile",
    "--- a/Makefile",
    "+++ b/Makefile",
    "@@ -1,2 +1,2 @@",
    " all:",
    "-\tcc -o app main.c",
    "+\tcc -O2 -o app main.c",
    "",
].join("\n");

export const kCOVER_BODY = [
    "[Impact]",
    "The build fails on arm64.",
    "",
    "[Fix]",
    "Pass -O2.",
    "",
    "[Test]",
    "Built on arm64.",
].join("\n");

export interface MessageFixture {
    readonly id: string;
    readonly subject?: string;
    readonly body?: string;
    readonly sender?: string | null;
    /** ISO timestamp, UTC unless it carries an offset */
    readonly at?: string;
    readonly inReplyTo?: string | null;
    readonly references?: readonly string[];
    readonly category?: Category;
}

/**
 * Build a message with sensible defaults.
 */
export function makeMessage(fixture: MessageFixture): MailMessage {
    return createMailMessage({
        id      : fixture.id,
        content : fixture.body ?? "",
        category: fixture.category ?? Category.NotPatch,
        metadata: {
            subject   : fixture.subject ?? "",
            sender    : fixture.sender === undefined ? "Jane Dev <jane@example.com>" : fixture.sender,
            timestamp : DateTime.fromISO(fixture.at ?? "2022-11-01T10:00:00Z", { setZone: true }),
            inReplyTo : fixture.inReplyTo ?? null,
            references: new Set(fixture.references ?? []),
        },
    });
}

/**
 * Action context around a group, with a silent logger.
 */
export function makeContext<TGroup>(group: TGroup, groupId = "<p1@example.com>"): ActionContext<TGroup> {
    return {
        group,
        groupId,
        config : {},
        logger : silentLogger,
        traceId: "tr_test",
    };
}
