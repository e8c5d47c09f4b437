/**
 * @fileoverview Unit tests for SimpleClassifier
 *
 * Tests cover:
 * - Review keywords (applied, nak/nac, ack)
 * - The patch gate (subject, Message-Id, diff, template markers)
 * - Cover letters versus patches
 *
 * @module __tests__/SimpleClassifier
 */

import { describe, it, expect } from "vitest";
import { SimpleClassifier, hasTemplateMarkers, hasUnifiedDiff } from "../domain/classifiers/SimpleClassifier.js";
import { Category } from "../domain/entities/Category.js";
import { isClassifier } from "@mltriage/engine";
import { kCOVER_BODY, kDIFF_BODY, makeMessage } from "./helpers.js";

describe("SimpleClassifier", () => {
    const classifier = new SimpleClassifier();

    // Scenario: Satisfies the engine contract
    it("should be recognised as a Classifier", () => {
        expect(isClassifier(classifier)).toBe(true);
        expect(classifier.id).toBe("simple-classifier");
    });

    describe("review keywords", () => {
        // Scenario: Missing subject
        it("should classify a message without subject as NotPatch", () => {
            const message = makeMessage({ id: "<m1@example.com>", subject: "", body: kDIFF_BODY });

            expect(classifier.classify(message)).toBe(Category.NotPatch);
        });

        // Scenario: Applied reply
        it("should classify 'APPLIED: ...' as PatchApplied", () => {
            const message = makeMessage({ id: "<m1@example.com>", subject: "APPLIED: [PATCH] Fix build" });

            expect(classifier.classify(message)).toBe(Category.PatchApplied);
        });

        // Scenario: "nack: wrong approach" is a nak
        it("should classify nak and nac prefixes as PatchNak", () => {
            for (const subject of ["nack: wrong approach", "NAK: [PATCH] Fix build", "Nac k: [PATCH]"]) {
                const message = makeMessage({ id: "<m1@example.com>", subject });
                expect(classifier.classify(message)).toBe(Category.PatchNak);
            }
        });

        // Scenario: Ack reply
        it("should classify 'ACK: ...' as PatchAck", () => {
            const message = makeMessage({ id: "<m1@example.com>", subject: "ACK: [PATCH] Fix build" });

            expect(classifier.classify(message)).toBe(Category.PatchAck);
        });

        // Scenario: Review keyword wins over a diff
        it("should prefer the review keyword over patch signals", () => {
            const message = makeMessage({ id: "<m1@example.com>", subject: "Acked: [PATCH] Fix build", body: kDIFF_BODY });

            expect(classifier.classify(message)).toBe(Category.PatchAck);
        });
    });

    describe("patch gate", () => {
        // Scenario: "[PATCH] Fix bug" with an inline diff
        it("should classify a patch subject with a diff as PatchN", () => {
            const message = makeMessage({ id: "<p1>", subject: "[PATCH] Fix bug", body: kDIFF_BODY });

            expect(classifier.classify(message)).toBe(Category.PatchN);
        });

        // Scenario: Message-Id generated by git-send-email
        it("should accept a patch subject with a git-send-email Message-Id", () => {
            const message = makeMessage({
                id     : "<20221101100000.1234-1-jane@example.com.git-send-email>",
                subject: "[SRU][Jammy][PATCH 1/2] Fix build",
                body   : "No diff here.",
            });

            expect(classifier.classify(message)).toBe(Category.PatchN);
        });

        // Scenario: subject "[PATCH] Fix bug", message-id <p1>, no reply headers
        it("should classify a lone [PATCH] Fix bug message as PatchN", () => {
            const message = makeMessage({ id: "<p1>", subject: "[PATCH] Fix bug" });

            expect(classifier.classify(message)).toBe(Category.PatchN);
        });

        // Scenario: Whitespace-only body counts as empty
        it("should accept a patch subject whose body is blank", () => {
            const message = makeMessage({ id: "<p1>", subject: "[PATCH] Fix bug", body: "\n  \n" });

            expect(classifier.classify(message)).toBe(Category.PatchN);
        });

        // Scenario: Patch subject with prose but no patch signal
        it("should classify a patch subject without signals as NotPatch", () => {
            const message = makeMessage({ id: "<p1>", subject: "[PATCH] Fix bug", body: "Please review." });

            expect(classifier.classify(message)).toBe(Category.NotPatch);
        });

        // Scenario: "Re:" in front of a patch subject fails the gate
        it("should classify a Re: reply as NotPatch even with a diff", () => {
            const message = makeMessage({ id: "<p2>", subject: "Re: [PATCH] Fix bug", body: kDIFF_BODY });

            expect(classifier.classify(message)).toBe(Category.NotPatch);
        });

        // Scenario: Other accepted subject prefixes
        it("should accept pull, ubuntu and sru prefixes", () => {
            for (const subject of ["[PULL] Jammy fixes", "UBUNTU: SAUCE: fix", "sru fixes"]) {
                const message = makeMessage({ id: "<p1>", subject, body: kDIFF_BODY });
                expect(classifier.classify(message)).toBe(Category.PatchN);
            }
        });
    });

    describe("cover letters", () => {
        // Scenario: Template markers without diff
        it("should classify a body with template markers as PatchCoverLetter", () => {
            const message = makeMessage({ id: "<c1>", subject: "[SRU][PATCH 0/2] Fix build", body: kCOVER_BODY });

            expect(classifier.classify(message)).toBe(Category.PatchCoverLetter);
        });

        // Scenario: A single marker is not enough
        it("should not treat a single marker as a cover letter", () => {
            const message = makeMessage({ id: "<c1>", subject: "[PATCH 0/2] Fix build", body: "[Impact]\nBroken." });

            expect(classifier.classify(message)).toBe(Category.NotPatch);
        });
    });

    describe("helpers", () => {
        // Scenario: Marker matching is case-sensitive
        it("should count template markers case-sensitively", () => {
            expect(hasTemplateMarkers("[Impact]\n[Test Plan]")).toBe(true);
            expect(hasTemplateMarkers("[impact]\n[test plan]")).toBe(false);
        });

        // Scenario: Plain prose is no diff
        it("should detect unified diffs only when a hunk is present", () => {
            expect(hasUnifiedDiff(kDIFF_BODY)).toBe(true);
            expect(hasUnifiedDiff("Looks good to me.\n---\nJane")).toBe(false);
        });

        // Scenario: Components are not derived
        it("should return no affected components", () => {
            expect(classifier.extractAffectedComponents(makeMessage({ id: "<p1>" }))).toEqual([]);
        });
    });
});
