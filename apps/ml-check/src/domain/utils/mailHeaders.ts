/**
 * @fileoverview Mail header helpers
 *
 * The archive's monthly text files are produced by list software that
 * rewrites addresses ("user at domain") and does not stick to one
 * date format. These helpers undo that.
 *
 * @module domain/utils/mailHeaders
 */

import { DateTime } from "luxon";

/**
 * Formats seen in the Date header, tried in order. `H` takes one or two
 * digits, so "8:30:27" parses as well as "08:30:27".
 */
const kDATE_FORMATS = [
    // RFC 2822
    "EEE, d MMM yyyy H:mm:ss ZZZ",
    // Weekday omitted, which RFC 2822 allows
    "d MMM yyyy H:mm:ss ZZZ",
] as const;

/** `<user at domain>`, as found in Acked-by and Signed-off-by lines */
const kMANGLED_STRICT = /<([^\s\\]+)\sat\s([^\s\\]+)>/g;

/** `user at domain (Display Name)`, as found in From headers */
const kMANGLED_LOOSE = /^([^\s\\]+)\sat\s([^\s\\]+)\s+\(([^()]*)\)/i;

const kLOOKS_MANGLED = /\S+\sat\s\S+/i;

interface WarnLogger {
    warn(message: string, data?: Record<string, unknown>): void;
}

/**
 * Parse a Date header.
 *
 * A trailing parenthetical comment such as "(PDT)" is dropped and runs
 * of whitespace collapse before parsing. The sender's UTC offset is
 * kept on the result.
 *
 * @param raw - Raw header value
 * @param logger - Receives a warning when no format matches
 * @returns The timestamp, or null when absent or unparseable
 *
 * @example
 * ```typescript
 * parseMailDate("Tue, 1 Nov 2022 10:15:00 -0700 (PDT)")?.toISO();
 * // "2022-11-01T10:15:00.000-07:00"
 * ```
 */
export function parseMailDate(raw: string | null | undefined, logger?: WarnLogger): DateTime | null {
    if (!raw) {
        return null;
    }

    const cleaned = raw
        .replace(/\s+/g, " ")
        .trim()
        .replace(/\s*\([^()]*\)$/, "");

    for (const format of kDATE_FORMATS) {
        const parsed = DateTime.fromFormat(cleaned, format, { locale: "en-US", setZone: true });
        if (parsed.isValid) {
            return parsed;
        }
    }

    logger?.warn("No parser matched mail date", { date: raw });
    return null;
}

/**
 * Parse a References header into a set of Message-Ids.
 */
export function parseMailReferences(raw: string | null | undefined): Set<string> {
    const references = new Set<string>();
    if (!raw) {
        return references;
    }

    for (const messageId of raw.split(/\s+/)) {
        if (messageId) {
            references.add(messageId);
        }
    }
    return references;
}

/**
 * Reverse the list software's address mangling.
 *
 * Strict mode rewrites every `<user at domain>` to `<user@domain>` and
 * leaves the rest of the text alone; use it for bodies, which may not
 * contain any address at all.
 *
 * Loose mode expects a From header shaped like
 * `user at domain (Display Name)` and returns `Display Name <user@domain>`.
 * A display name that is empty or is itself a mangled address is
 * dropped, leaving the bare `user@domain`. A value that is not shaped
 * like that gets the strict rewrite.
 *
 * @example
 * ```typescript
 * demangleEmail("jane at example.com (Jane Dev)");
 * // "Jane Dev <jane@example.com>"
 * demangleEmail("Acked-by: Jane Dev <jane at example.com>", true);
 * // "Acked-by: Jane Dev <jane@example.com>"
 * ```
 */
export function demangleEmail(raw: string, strict?: boolean): string;
export function demangleEmail(raw: string | null, strict?: boolean): string | null;
export function demangleEmail(raw: string | null, strict = false): string | null {
    if (raw === null) {
        return null;
    }

    if (!strict) {
        const match = kMANGLED_LOOSE.exec(raw);
        if (match) {
            const [, user, domain, name] = match;
            const address = `${user}@${domain}`;
            const displayName = name.trim();

            if (!displayName || kLOOKS_MANGLED.test(displayName)) {
                return address;
            }
            return `${displayName} <${address}>`;
        }
    }

    return raw.replace(kMANGLED_STRICT, "<$1@$2>");
}

/**
 * Lower-cased address of a sender: the part inside `<...>` when there
 * is one, else the whole value.
 *
 * @example
 * ```typescript
 * senderAddress("Jane Dev <Jane@Example.com>"); // "jane@example.com"
 * senderAddress("jane@example.com");            // "jane@example.com"
 * ```
 */
export function senderAddress(sender: string): string {
    const angled = /<([^<>]+)>/.exec(sender);
    return (angled ? angled[1] : sender).trim().toLowerCase();
}

/**
 * Collapse newlines, tabs and doubled spaces in a subject line.
 */
export function normalizeSubject(subject: string): string {
    return subject.replace(/[\r\n\t]/g, " ").replace(/ {2,}/g, " ");
}

/**
 * Undo RFC 5322 header folding.
 */
export function unfoldHeader(value: string): string {
    return value.replace(/\r?\n[ \t]+/g, " ").trim();
}
