/**
 * @fileoverview Mailbox reader
 *
 * Turns the text of a monthly archive file (mbox layout) into
 * MailMessage entities. Each mail is parsed with mailparser; the
 * linkage headers are read verbatim from the raw header lines so that
 * Message-Ids keep their angle brackets.
 *
 * @module domain/utils/mbox
 */

import { simpleParser, type ParsedMail } from "mailparser";
import type { Classifier, EngineLogger } from "@mltriage/engine";
import type { Category } from "../entities/Category.js";
import { createMailMessage, withCategory, type MailMessage } from "../entities/MailMessage.js";
import {
    demangleEmail,
    normalizeSubject,
    parseMailDate,
    parseMailReferences,
    unfoldHeader,
} from "./mailHeaders.js";

/**
 * Header values of one mail, before validation.
 */
export interface RawMail {
    readonly messageId: string | null;
    readonly inReplyTo: string | null;
    readonly references: string | null;
    readonly date: string | null;
    readonly from: string | null;
    readonly subject: string | null;
    readonly body: string;
}

export interface ReadMailboxOptions {
    /** Gives every message its initial category */
    readonly classifier?: Classifier<MailMessage, Category>;
    readonly logger?: EngineLogger;
}

export interface MailboxContents {
    readonly messages: MailMessage[];

    /** Mails dropped for a missing Message-Id, Subject or Date */
    readonly skipped: number;
}

/**
 * Split mbox text into individual mails.
 *
 * Mails are separated by lines starting with "From "; the separator
 * line itself is removed and ">From " escapes are undone.
 */
export function splitMbox(text: string): string[] {
    return text
        .replace(/\r\n/g, "\n")
        .split(/\n(?=From )/)
        .map(block => {
            if (!block.startsWith("From ")) {
                return block;
            }
            const newline = block.indexOf("\n");
            return newline === -1 ? "" : block.slice(newline + 1);
        })
        .map(block => block.replace(/^>(>*From )/gm, "$1"))
        .filter(block => block.trim().length > 0);
}

function headerValue(parsed: ParsedMail, key: string): string | null {
    const header = parsed.headerLines.find(candidate => candidate.key === key);
    if (!header) {
        return null;
    }

    const value = unfoldHeader(header.line.slice(header.line.indexOf(":") + 1));
    return value.length > 0 ? value : null;
}

/**
 * Parse one mail into its raw header values.
 */
export async function parseRawMail(source: string): Promise<RawMail> {
    const parsed = await simpleParser(source, {
        skipHtmlToText: true,
        skipTextToHtml: true,
        skipImageLinks: true,
    });

    return {
        messageId : headerValue(parsed, "message-id"),
        inReplyTo : headerValue(parsed, "in-reply-to"),
        references: headerValue(parsed, "references"),
        date      : headerValue(parsed, "date"),
        from      : headerValue(parsed, "from"),
        subject   : parsed.subject ?? null,
        body      : parsed.text ?? "",
    };
}

/**
 * Validate raw header values and build a message.
 *
 * @returns The message, or null when Message-Id, Subject or a
 *   parseable Date is missing
 */
export function toMailMessage(raw: RawMail, options: ReadMailboxOptions = {}): MailMessage | null {
    const { classifier, logger } = options;
    const timestamp = parseMailDate(raw.date, logger);

    if (raw.messageId === null || raw.subject === null || timestamp === null) {
        logger?.debug("Dropping malformed message", {
            messageId: raw.messageId,
            date     : raw.date,
            body     : raw.body.slice(0, 32).trim(),
        });
        return null;
    }

    // Some clients append a comment after the id ("<id> (Jane's message of ...)")
    const inReplyTo = raw.inReplyTo === null
        ? null
        : /<[^<>]+>/.exec(raw.inReplyTo)?.[0] ?? raw.inReplyTo;

    const message = createMailMessage({
        id      : raw.messageId,
        content : demangleEmail(raw.body, true),
        metadata: {
            subject   : normalizeSubject(raw.subject),
            sender    : demangleEmail(raw.from),
            timestamp,
            inReplyTo,
            references: parseMailReferences(raw.references),
        },
    });

    return classifier ? withCategory(message, classifier.classify(message)) : message;
}

/**
 * Read every message of an mbox text.
 *
 * @example
 * ```typescript
 * const { messages, skipped } = await readMailbox(archiveText, { classifier, logger });
 * ```
 */
export async function readMailbox(text: string, options: ReadMailboxOptions = {}): Promise<MailboxContents> {
    const messages: MailMessage[] = [];
    let skipped = 0;

    for (const block of splitMbox(text)) {
        const message = toMailMessage(await parseRawMail(block), options);
        if (message) {
            messages.push(message);
        }
        else {
            skipped++;
        }
    }

    return { messages, skipped };
}
