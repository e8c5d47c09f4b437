/**
 * @fileoverview Simple Classifier
 *
 * Implements the Classifier contract for mailing-list messages with
 * subject keywords, the Message-Id and the body. It sees one message
 * at a time; thread context is applied later by `reclassify`.
 *
 * Decision list (first match wins, subject tests ignore case):
 *
 * 1. **No subject** → `NotPatch`
 * 2. **"applied…"** → `PatchApplied`
 * 3. **"nak…" / "nac…"** → `PatchNak`
 * 4. **"ack…"** → `PatchAck`
 * 5. **Patch-shaped subject** and one of: a Message-Id from
 *    git-send-email, an empty body, an inline diff, or two template
 *    markers. Otherwise `NotPatch`.
 * 6. A patch with two template markers is a `PatchCoverLetter`,
 *    any other patch is `PatchN`
 *
 * @module domain/classifiers/SimpleClassifier
 */

import { parsePatch } from "diff";
import type { Classifier } from "@mltriage/engine";
import { Category } from "../entities/Category.js";
import type { MailMessage } from "../entities/MailMessage.js";

/** Subject gate for anything that may be a patch, anchored at the start */
const kPATCH_SUBJECT = /^\[?(patch|sru|ubuntu|pull)/i;

/** Marker git-send-email leaves in the Message-Id it generates */
const kSEND_EMAIL_ID = "git-send-email";

/** Section headings of the stable-release-update cover letter template */
const kTEMPLATE_MARKERS = [
    "[Impact]",
    "[Fix]",
    "[Test]",
    "[Test Plan]",
    "[Where problems could occur]",
] as const;

const kMIN_TEMPLATE_MARKERS = 2;

/**
 * Whether a body carries at least two template markers.
 */
export function hasTemplateMarkers(body: string): boolean {
    const found = kTEMPLATE_MARKERS.filter(marker => body.includes(marker));
    return found.length >= kMIN_TEMPLATE_MARKERS;
}

/**
 * Whether a body contains a unified diff with at least one hunk.
 * Bodies that fail to parse have no diff.
 */
export function hasUnifiedDiff(body: string): boolean {
    try {
        return parsePatch(body).some(file => file.hunks.length > 0);
    }
    catch {
        return false;
    }
}

/**
 * Simple Classifier
 *
 * @example
 * ```typescript
 * const classifier = new SimpleClassifier();
 *
 * classifier.classify(message);
 * // "[PATCH 1/2] Fix build" with a diff     → "PatchN"
 * // "[SRU][PATCH 0/2] ..." with [Impact]... → "PatchCoverLetter"
 * // "ACK: [PATCH] Fix build"                → "PatchAck"
 * // "Re: [PATCH] Fix build"                 → "NotPatch"
 * ```
 */
export class SimpleClassifier implements Classifier<MailMessage, Category> {
    readonly id          = "simple-classifier";
    readonly name        = "Simple Classifier";
    readonly description = "Subject, Message-Id and body heuristics for patch review mail";

    classify(message: MailMessage): Category {
        const subject = message.metadata.subject;
        if (!subject) {
            return Category.NotPatch;
        }

        const lowered = subject.toLowerCase();

        if (lowered.startsWith("applied")) {
            return Category.PatchApplied;
        }

        // NAK, NACK and NAC K all show up on the list
        if (lowered.startsWith("nak") || lowered.startsWith("nac")) {
            return Category.PatchNak;
        }

        if (lowered.startsWith("ack")) {
            return Category.PatchAck;
        }

        if (!this.isPatch(message)) {
            return Category.NotPatch;
        }

        return hasTemplateMarkers(message.content) ? Category.PatchCoverLetter : Category.PatchN;
    }

    /**
     * Affected kernels are not derived yet.
     */
    extractAffectedComponents(_message: MailMessage): readonly string[] {
        return [];
    }

    private isPatch(message: MailMessage): boolean {
        if (!kPATCH_SUBJECT.test(message.metadata.subject)) {
            return false;
        }

        // Nothing in the body to contradict the subject
        return message.id.includes(kSEND_EMAIL_ID)
            || message.content.trim() === ""
            || hasUnifiedDiff(message.content)
            || hasTemplateMarkers(message.content);
    }
}
