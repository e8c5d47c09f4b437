/**
 * @fileoverview Thread-aware reclassification
 *
 * A reply that keeps a patch subject and omits "Re:" looks exactly
 * like a fresh patch to the local classifier. Its position in the
 * thread gives it away: real series members reply to the epoch (or to
 * nothing), and review replies answer a patch.
 *
 * @module domain/patchsets/reclassify
 */

import type { Classifier } from "@mltriage/engine";
import { Category, PATCH_CATEGORIES, isAnyOf } from "../entities/Category.js";
import { withCategory, type MailMessage } from "../entities/MailMessage.js";

/**
 * The root patch of a thread: its earliest cover letter, else its
 * earliest PatchN.
 */
export function findEpoch(messages: readonly MailMessage[]): MailMessage | null {
    return earliestOf(messages, Category.PatchCoverLetter)
        ?? earliestOf(messages, Category.PatchN);
}

function earliestOf(messages: readonly MailMessage[], category: Category): MailMessage | null {
    let earliest: MailMessage | null = null;
    for (const message of messages) {
        if (message.category !== category) {
            continue;
        }
        if (earliest === null || message.metadata.timestamp.toMillis() < earliest.metadata.timestamp.toMillis()) {
            earliest = message;
        }
    }
    return earliest;
}

/**
 * Category a message keeps given where it sits relative to the epoch
 * and its parent.
 */
function structuralCategory(
    message: MailMessage,
    epoch: MailMessage,
    byId: ReadonlyMap<string, MailMessage>
): Category {
    const { inReplyTo } = message.metadata;

    switch (message.category) {
        // NotPatch is terminal: the local pass already ran, and a demoted
        // message must not be promoted back
        case Category.NotPatch:
        // Extra cover letters are taken as cross-posts
        case Category.PatchCoverLetter:
            return message.category;

        case Category.PatchN:
            return inReplyTo === null || inReplyTo === epoch.id
                ? Category.PatchN
                : Category.NotPatch;

        case Category.PatchAck:
        case Category.PatchNak:
        case Category.PatchApplied: {
            if (inReplyTo === null) {
                return message.category;
            }
            const parent = byId.get(inReplyTo);
            if (parent === undefined || isAnyOf(parent.category, PATCH_CATEGORIES)) {
                return message.category;
            }
            return Category.NotPatch;
        }
    }
}

/**
 * Classify every message of a thread, then correct the categories
 * using the thread's structure.
 *
 * 1. Every message gets the local classifier's category.
 * 2. The epoch is found; without one the local categories stand.
 * 3. Every other message is checked against its position:
 *    - a PatchN must reply to the epoch or to nothing;
 *    - an ack, nak or applied whose parent is in the thread must
 *      answer a cover letter or a PatchN.
 *    Failing messages become NotPatch. Step 3 repeats until nothing
 *    changes, so an ack under a demoted ack is demoted as well.
 *
 * The input is not modified; the result holds fresh copies. Running
 * it again on its own output changes nothing.
 *
 * @param thread - Messages of one thread, chronological
 * @param classifier - Local classifier
 * @returns Messages in the same order with their final categories
 */
export function reclassify(
    thread: readonly MailMessage[],
    classifier: Classifier<MailMessage, Category>
): MailMessage[] {
    let current = thread.map(message => withCategory(message, classifier.classify(message)));

    const epoch = findEpoch(current);
    if (epoch === null) {
        return current;
    }

    let changed = true;
    while (changed) {
        changed = false;
        const byId = new Map(current.map(message => [message.id, message]));

        current = current.map(message => {
            if (message.id === epoch.id) {
                return message;
            }

            const category = structuralCategory(message, epoch, byId);
            if (category === message.category) {
                return message;
            }

            changed = true;
            return withCategory(message, category);
        });
    }

    return current;
}
