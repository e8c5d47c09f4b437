/**
 * @fileoverview PatchSet
 *
 * One classified thread. Every view is derived from the messages'
 * current categories when it is read; nothing is cached.
 *
 * @module domain/patchsets/PatchSet
 */

import type { Classifier } from "@mltriage/engine";
import { Category } from "../entities/Category.js";
import { compareByTimestamp, type MailMessage } from "../entities/MailMessage.js";
import { findEpoch, reclassify } from "./reclassify.js";

/**
 * PatchSet
 *
 * @example
 * ```typescript
 * for (const thread of threadMessages(messages)) {
 *     const patchSet = PatchSet.fromThread(thread, classifier);
 *     if (patchSet.epochPatch && patchSet.acks.length < 2) {
 *         console.log(patchSet.epochPatch.metadata.subject);
 *     }
 * }
 * ```
 */
export class PatchSet {
    private readonly messages: readonly MailMessage[];

    /**
     * @param messages - Already classified messages of one thread
     */
    constructor(messages: readonly MailMessage[]) {
        this.messages = [...messages].sort(compareByTimestamp);
    }

    /**
     * Classify a thread in context and wrap it.
     */
    static fromThread(thread: readonly MailMessage[], classifier: Classifier<MailMessage, Category>): PatchSet {
        return new PatchSet(reclassify(thread, classifier));
    }

    /** Earliest cover letter, else earliest PatchN, else null */
    get epochPatch(): MailMessage | null {
        return findEpoch(this.messages);
    }

    /**
     * Identifier for logs: the epoch's Message-Id, or the first
     * message's when the thread has no epoch.
     */
    get id(): string {
        return this.epochPatch?.id ?? this.messages[0]?.id ?? "";
    }

    /** Every PatchN, chronological */
    get patches(): MailMessage[] {
        return this.ofCategory(Category.PatchN);
    }

    get coverLetters(): MailMessage[] {
        return this.ofCategory(Category.PatchCoverLetter);
    }

    get acks(): MailMessage[] {
        return this.ofCategory(Category.PatchAck);
    }

    get naks(): MailMessage[] {
        return this.ofCategory(Category.PatchNak);
    }

    get applieds(): MailMessage[] {
        return this.ofCategory(Category.PatchApplied);
    }

    get notPatches(): MailMessage[] {
        return this.ofCategory(Category.NotPatch);
    }

    /** Every message of the thread, chronological */
    get allMessages(): readonly MailMessage[] {
        return this.messages;
    }

    get length(): number {
        return this.messages.length;
    }

    countOf(category: Category): number {
        return this.ofCategory(category).length;
    }

    private ofCategory(category: Category): MailMessage[] {
        return this.messages.filter(message => message.category === category);
    }
}

/**
 * Order patch sets by epoch timestamp; sets without an epoch first.
 */
export function comparePatchSets(a: PatchSet, b: PatchSet): number {
    const epochA = a.epochPatch;
    const epochB = b.epochPatch;

    if (epochA === null || epochB === null) {
        return (epochA === null ? 0 : 1) - (epochB === null ? 0 : 1);
    }
    return compareByTimestamp(epochA, epochB);
}
