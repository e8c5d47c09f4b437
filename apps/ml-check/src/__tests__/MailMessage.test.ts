/**
 * @fileoverview Unit tests for the MailMessage entity and categories
 *
 * Tests cover:
 * - Factory defaults and immutable copies
 * - Thread URL, patch name, patch file and summary renderings
 * - Category groups
 *
 * @module __tests__/MailMessage
 */

import { describe, it, expect } from "vitest";
import {
    cloneMessage,
    compareByTimestamp,
    formatThreadUrl,
    generatePatch,
    generatePatchName,
    isMailMessage,
    isSameMessage,
    shortSummary,
    withCategory,
} from "../domain/entities/MailMessage.js";
import {
    Category,
    PATCH_CATEGORIES,
    REVIEW_CATEGORIES,
    isAnyOf,
    isCategory,
} from "../domain/entities/Category.js";
import { parseMailDate } from "../domain/utils/mailHeaders.js";
import { makeMessage } from "./helpers.js";

const kTHREAD_URL = "https://lists.example.org/archives/{year}-{month}/thread.html";

describe("MailMessage", () => {
    describe("factory", () => {
        // Scenario: New message defaults to NotPatch
        it("should create a NotPatch mail-message entity", () => {
            const message = makeMessage({ id: "<m1@example.com>" });

            expect(message.type).toBe("mail-message");
            expect(message.category).toBe(Category.NotPatch);
            expect(isMailMessage(message)).toBe(true);
            expect(isMailMessage({ id: "x", content: "", metadata: {} })).toBe(false);
        });

        // Scenario: withCategory copies, never mutates
        it("should return a copy with the new category", () => {
            const original = makeMessage({ id: "<m1@example.com>" });
            const acked = withCategory(original, Category.PatchAck);

            expect(acked.category).toBe(Category.PatchAck);
            expect(original.category).toBe(Category.NotPatch);
            expect(isSameMessage(original, acked)).toBe(true);
        });

        // Scenario: cloneMessage merges metadata
        it("should merge metadata changes when cloning", () => {
            const original = makeMessage({ id: "<m1@example.com>", subject: "Old" });
            const clone = cloneMessage(original, { metadata: { subject: "New" } });

            expect(clone.metadata.subject).toBe("New");
            expect(clone.metadata.sender).toBe("Jane Dev <jane@example.com>");
            expect(original.metadata.subject).toBe("Old");
        });

        // Scenario: Chronological comparison across offsets
        it("should compare instants, not local times", () => {
            const utc = makeMessage({ id: "<a>", at: "2022-11-01T10:00:00Z" });
            const pacific = makeMessage({ id: "<b>", at: "2022-11-01T05:00:00-07:00" });

            expect(compareByTimestamp(utc, pacific)).toBeLessThan(0);
        });
    });

    describe("renderings", () => {
        // Scenario: Thread URL uses the month in the sender's own offset
        it("should fill the thread URL with year and English month name", () => {
            const message = makeMessage({ id: "<m1>", at: "2022-11-30T20:00:00-05:00" });

            expect(formatThreadUrl(message, kTHREAD_URL))
                .toBe("https://lists.example.org/archives/2022-November/thread.html");
        });

        // Scenario: Late-evening mail near a month boundary
        it("should keep the sender's month in the summary of mail parsed from the archive", () => {
            const timestamp = parseMailDate("Wed, 30 Nov 2022 20:00:00 -0700");
            if (timestamp === null) {
                throw new Error("fixture date did not parse");
            }
            const message = cloneMessage(makeMessage({ id: "<m1>", subject: "[PATCH] Fix build" }), { metadata: { timestamp } });

            expect(shortSummary(message, kTHREAD_URL))
                .toBe("[2022.11] https://lists.example.org/archives/2022-November/thread.html [PATCH] Fix build");
        });

        // Scenario: Patch name from subject and id
        it("should build a filename-safe patch name", () => {
            const message = makeMessage({ id: "<20221101.1@example.com>", subject: "[PATCH 1/2] Fix build" });

            expect(generatePatchName(message)).toBe("PATCH_1_2__Fix_build___20221101_1_example_com");
        });

        // Scenario: No subject, no name
        it("should return null for an empty subject", () => {
            expect(generatePatchName(makeMessage({ id: "<m1>", subject: "" }))).toBeNull();
        });

        // Scenario: Patch file layout
        it("should render a patch file with headers and body", () => {
            const message = makeMessage({
                id     : "<m1@example.com>",
                subject: "[PATCH] Fix build",
                body   : "diff body",
                at     : "2022-11-01T10:15:00Z",
            });

            expect(generatePatch(message)).toBe([
                "Date: Tue, 01 Nov 2022 10:15:00 +0000",
                "From: Jane Dev <jane@example.com>",
                "Subject: [PATCH] Fix build",
                "Message-Id: <m1@example.com>",
                "",
                "diff body",
            ].join("\n"));
        });

        // Scenario: Missing sender renders empty
        it("should leave From empty without a sender", () => {
            const message = makeMessage({ id: "<m1>", sender: null, at: "2022-11-01T10:15:00Z" });

            expect(generatePatch(message).split("\n")[1]).toBe("From: ");
        });

        // Scenario: Summary line
        it("should render a one-line summary", () => {
            const message = makeMessage({ id: "<m1>", subject: "[PATCH] Fix build", at: "2022-03-05T10:00:00Z" });

            expect(shortSummary(message, kTHREAD_URL))
                .toBe("[2022.03] https://lists.example.org/archives/2022-March/thread.html [PATCH] Fix build");
        });
    });
});

describe("Category", () => {
    // Scenario: Group membership
    it("should test membership in category groups", () => {
        expect(isAnyOf(Category.PatchN, PATCH_CATEGORIES)).toBe(true);
        expect(isAnyOf(Category.PatchAck, PATCH_CATEGORIES)).toBe(false);
        expect(isAnyOf(Category.PatchApplied, REVIEW_CATEGORIES)).toBe(true);
        expect(isAnyOf(Category.NotPatch, [Category.PatchAck, Category.PatchNak])).toBe(false);
    });

    // Scenario: Category names
    it("should recognise category names", () => {
        expect(isCategory("PatchCoverLetter")).toBe(true);
        expect(isCategory("Patch")).toBe(false);
    });
});
