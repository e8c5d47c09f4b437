/**
 * @fileoverview Mail Message Entity
 *
 * Domain-specific entity that extends the base Entity contract
 * with mailing-list metadata, plus the per-message renderings used
 * by reports (thread URL, patch file, patch name, summary line).
 *
 * Messages are immutable. A new category is applied by copying the
 * message with `withCategory`.
 *
 * @module domain/entities/MailMessage
 */

import { DateTime } from "luxon";
import type { Entity } from "@mltriage/engine";
import { Category } from "./Category.js";

/**
 * Mailing-list metadata
 */
export interface MailMessageMetadata {
    /** Normalized subject line */
    readonly subject: string;

    /** De-mangled From header ("Name <user@domain>") */
    readonly sender: string | null;

    /** Date header, keeping the sender's UTC offset */
    readonly timestamp: DateTime;

    /** Message-Id this message replies to */
    readonly inReplyTo: string | null;

    /** Message-Ids listed in the References header */
    readonly references: ReadonlySet<string>;
}

/**
 * Mail Message Entity
 *
 * `id` is the Message-Id header and `content` the de-mangled body.
 */
export interface MailMessage extends Entity<MailMessageMetadata> {
    /** Entity type discriminator */
    readonly type: "mail-message";

    /** Current classification */
    readonly category: Category;
}

/**
 * Input data for creating a MailMessage
 */
export interface MailMessageInput {
    readonly id: string;
    readonly content: string;
    readonly metadata: MailMessageMetadata;
    readonly category?: Category;
    readonly traceId?: string;
}

/**
 * Factory function to create a MailMessage entity.
 *
 * @param data - The message data (category defaults to NotPatch)
 * @returns A new MailMessage entity with type discriminator
 *
 * @example
 * ```typescript
 * const message = createMailMessage({
 *     id      : "<20221101.1@example.com>",
 *     content : "diff --git a/Makefile b/Makefile ...",
 *     metadata: {
 *         subject   : "[PATCH] Fix build",
 *         sender    : "Jane Dev <jane@example.com>",
 *         timestamp : DateTime.fromISO("2022-11-01T10:00:00Z"),
 *         inReplyTo : null,
 *         references: new Set(),
 *     },
 * });
 * ```
 */
export function createMailMessage(data: MailMessageInput): MailMessage {
    return {
        id      : data.id,
        content : data.content,
        metadata: data.metadata,
        traceId : data.traceId,
        category: data.category ?? Category.NotPatch,
        type    : "mail-message",
    };
}

/**
 * Type guard to check if an entity is a MailMessage
 */
export function isMailMessage(entity: Entity<object>): entity is MailMessage {
    return "type" in entity && entity.type === "mail-message";
}

/**
 * Copy a message with some fields replaced.
 */
export function cloneMessage(
    message: MailMessage,
    changes: {
        readonly content?: string;
        readonly metadata?: Partial<MailMessageMetadata>;
        readonly category?: Category;
    }
): MailMessage {
    return {
        ...message,
        content : changes.content ?? message.content,
        metadata: { ...message.metadata, ...changes.metadata },
        category: changes.category ?? message.category,
    };
}

/**
 * Copy a message carrying a new category.
 */
export function withCategory(message: MailMessage, category: Category): MailMessage {
    return { ...message, category };
}

/**
 * Chronological order. `Array.prototype.sort` is stable, so equal
 * timestamps keep their input order.
 */
export function compareByTimestamp(a: MailMessage, b: MailMessage): number {
    return a.metadata.timestamp.toMillis() - b.metadata.timestamp.toMillis();
}

/**
 * Message identity is the Message-Id alone.
 */
export function isSameMessage(a: MailMessage, b: MailMessage): boolean {
    return a.id === b.id;
}

// ============================================================================
// Renderings
// ============================================================================

/**
 * Archive thread URL for the month a message was sent in (UTC).
 *
 * @param template - URL with `{year}` and `{month}` placeholders; the
 *   month is the full English month name
 *
 * @example
 * ```typescript
 * formatThreadUrl(message, "https://lists.example.org/archives/{year}-{month}/thread.html");
 * // "https://lists.example.org/archives/2022-November/thread.html"
 * ```
 */
export function formatThreadUrl(message: MailMessage, template: string): string {
    const sent = message.metadata.timestamp.setLocale("en-US");
    return template
        .replaceAll("{year}", String(sent.year))
        .replaceAll("{month}", sent.toFormat("MMMM"));
}

/**
 * Filename-safe patch name, in the spirit of `git format-patch`.
 *
 * The Message-Id is appended so two patches sharing a subject get
 * distinct names. Every character outside [A-Za-z0-9] becomes `_`
 * and leading/trailing `_` are trimmed.
 *
 * @returns The name, or null when the subject is empty
 */
export function generatePatchName(message: MailMessage): string | null {
    if (!message.metadata.subject) {
        return null;
    }

    const name = `${message.metadata.subject}__${message.id}`
        .replace(/[^A-Za-z0-9]/g, "_")
        .replace(/^_+|_+$/g, "");

    return name.length > 0 ? name : null;
}

/**
 * Render a message as something resembling a .patch file.
 */
export function generatePatch(message: MailMessage): string {
    const { timestamp, sender, subject } = message.metadata;

    return [
        `Date: ${timestamp.toRFC2822() ?? timestamp.toISO() ?? ""}`,
        `From: ${sender ?? ""}`,
        `Subject: ${subject}`,
        `Message-Id: ${message.id}`,
        "",
        message.content,
    ].join("\n");
}

/**
 * Machine-readable one-line summary: `[YYYY.MM] <thread-url> <subject>`.
 */
export function shortSummary(message: MailMessage, threadUrlTemplate: string): string {
    const sent = message.metadata.timestamp;
    const month = String(sent.month).padStart(2, "0");
    return `[${sent.year}.${month}] ${formatThreadUrl(message, threadUrlTemplate)} ${message.metadata.subject}`;
}
