/**
 * @fileoverview Unit tests for the mailbox reader
 *
 * Tests cover:
 * - Splitting mbox text and undoing ">From " escapes
 * - Header extraction through mailparser
 * - Dropping malformed mail
 * - Applying the classifier
 *
 * @module __tests__/mbox
 */

import { describe, it, expect, vi } from "vitest";
import { readMailbox, splitMbox, toMailMessage, type RawMail } from "../domain/utils/mbox.js";
import { SimpleClassifier } from "../domain/classifiers/SimpleClassifier.js";
import { Category } from "../domain/entities/Category.js";
import { silentLogger } from "@mltriage/engine";

const kPATCH_MAIL = [
    "From jane at example.com  Tue Nov  1 10:15:00 2022",
    "From: jane at example.com (Jane Dev)",
    "Date: Tue, 1 Nov 2022 10:15:00 -0700",
    "Subject: [PATCH] Fix build",
    "Message-ID: <20221101.1-git-send-email-jane@example.com>",
    "",
    "Fix the build.",
    "",
    ">From the archive notes.",
    "Signed-off-by: Jane Dev <jane at example.com>",
    "",
].join("\n");

const kACK_MAIL = [
    "From sam at example.org  Wed Nov  2 09:00:00 2022",
    "From: sam at example.org (Sam Ops)",
    "Date: Wed, 2 Nov 2022 09:00:00 +0000",
    "Subject: ACK: [PATCH] Fix build",
    "Message-ID: <ack.1@example.org>",
    "In-Reply-To: <20221101.1-git-send-email-jane@example.com> (Jane Dev's message",
    " of Tue, 1 Nov 2022)",
    "References: <20221101.1-git-send-email-jane@example.com>",
    "",
    "Acked-by: Sam Ops <sam at example.org>",
    "",
].join("\n");

const kUNDATED_MAIL = [
    "From lost at example.net  Wed Nov  2 11:00:00 2022",
    "From: lost at example.net (Lost)",
    "Subject: Where did my date go",
    "Message-ID: <lost.1@example.net>",
    "",
    "No date here.",
    "",
].join("\n");

function raw(overrides: Partial<RawMail> = {}): RawMail {
    return {
        messageId : "<m1@example.com>",
        inReplyTo : null,
        references: null,
        date      : "Tue, 1 Nov 2022 10:15:00 +0000",
        from      : "jane at example.com (Jane Dev)",
        subject   : "[PATCH]  Fix\tbuild",
        body      : "text",
        ...overrides,
    };
}

describe("splitMbox", () => {
    // Scenario: Envelope lines removed, escapes undone
    it("should split mails and strip the envelope line", () => {
        const blocks = splitMbox(`${kPATCH_MAIL}${kACK_MAIL}`);

        expect(blocks).toHaveLength(2);
        expect(blocks[0].split("\n")[0]).toBe("From: jane at example.com (Jane Dev)");
        expect(blocks[0]).toContain("\nFrom the archive notes.\n");
        expect(blocks[1].split("\n")[0]).toBe("From: sam at example.org (Sam Ops)");
    });

    // Scenario: CRLF input and blank text
    it("should accept CRLF line endings and ignore blank input", () => {
        expect(splitMbox(kUNDATED_MAIL.replace(/\n/g, "\r\n"))).toHaveLength(1);
        expect(splitMbox("\n\n")).toEqual([]);
    });
});

describe("toMailMessage", () => {
    // Scenario: Header cleanup on a valid mail
    it("should build a message with cleaned headers", () => {
        const message = toMailMessage(raw({
            inReplyTo : "<p1@example.com> (Jane's message)",
            references: "<p0@example.com> <p1@example.com>",
            body      : "Acked-by: Sam Ops <sam at example.org>",
        }));

        expect(message?.id).toBe("<m1@example.com>");
        expect(message?.metadata.subject).toBe("[PATCH] Fix build");
        expect(message?.metadata.sender).toBe("Jane Dev <jane@example.com>");
        expect(message?.metadata.inReplyTo).toBe("<p1@example.com>");
        expect(message?.metadata.references).toEqual(new Set(["<p0@example.com>", "<p1@example.com>"]));
        expect(message?.content).toBe("Acked-by: Sam Ops <sam@example.org>");
        expect(message?.category).toBe(Category.NotPatch);
    });

    // Scenario: Required headers missing
    it("should drop mail without Message-Id, Subject or a valid Date", () => {
        const logger = { ...silentLogger, debug: vi.fn() };

        expect(toMailMessage(raw({ messageId: null }), { logger })).toBeNull();
        expect(toMailMessage(raw({ subject: null }), { logger })).toBeNull();
        expect(toMailMessage(raw({ date: "not a date" }), { logger })).toBeNull();
        expect(logger.debug).toHaveBeenCalledTimes(3);
    });
});

describe("readMailbox", () => {
    // Scenario: Full archive text through mailparser
    it("should read, classify and count skipped mail", async () => {
        const { messages, skipped } = await readMailbox(
            `${kPATCH_MAIL}${kACK_MAIL}${kUNDATED_MAIL}`,
            { classifier: new SimpleClassifier() }
        );

        expect(skipped).toBe(1);
        expect(messages.map(message => message.id)).toEqual([
            "<20221101.1-git-send-email-jane@example.com>",
            "<ack.1@example.org>",
        ]);

        const [patch, ack] = messages;
        expect(patch.category).toBe(Category.PatchN);
        expect(patch.metadata.sender).toBe("Jane Dev <jane@example.com>");
        expect(patch.metadata.timestamp.toISO()).toBe("2022-11-01T10:15:00.000-07:00");
        expect(patch.content).toContain("Signed-off-by: Jane Dev <jane@example.com>");

        expect(ack.category).toBe(Category.PatchAck);
        expect(ack.metadata.inReplyTo).toBe("<20221101.1-git-send-email-jane@example.com>");
        expect(ack.metadata.references).toEqual(new Set(["<20221101.1-git-send-email-jane@example.com>"]));
    });
});
