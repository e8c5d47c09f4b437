/**
 * @fileoverview Mail thread linkage
 *
 * Tells the engine's thread builder how mail links together: the
 * In-Reply-To header names the parent, References names earlier mail
 * of the conversation.
 *
 * @module domain/threads/mailThreadLinkage
 */

import { buildThreads, type ThreadLinkage } from "@mltriage/engine";
import { compareByTimestamp, type MailMessage } from "../entities/MailMessage.js";

export const mailThreadLinkage: ThreadLinkage<MailMessage> = {
    keyOf       : (message) => message.id,
    parentOf    : (message) => message.metadata.inReplyTo,
    referencesOf: (message) => message.metadata.references,
    compare     : compareByTimestamp,
};

/**
 * Group messages into chronological threads.
 */
export function threadMessages(messages: Iterable<MailMessage>): Iterable<MailMessage[]> {
    return buildThreads(messages, mailThreadLinkage);
}
