/**
 * Mailing-list archive client
 *
 * Downloads the monthly archive files ("YYYY-Month.txt.gz") published
 * by the list's web archive and returns their text.
 */

import { gunzipSync } from "zlib";
import { monthName, type MonthStep } from "../../../domain/utils/months.js";

/**
 * Raised when the archive answers with anything but success or 404
 */
export class ArchiveFetchError extends Error {
    constructor(
        message: string,
        readonly url: string,
        readonly status?: number
    ) {
        super(message);
        this.name = "ArchiveFetchError";
    }
}

/**
 * Source of monthly archive text
 */
export interface MonthSource {
    /**
     * @returns The month's mbox text, or null when it is not published
     */
    fetchMonth(step: MonthStep): Promise<string | null>;
}

export interface ArchiveClientOptions {
    /** URL template with `{year}` and `{month}` (full English month name) */
    readonly monthlyUrl: string;

    /** Request timeout in milliseconds (default: 60s) */
    readonly timeoutMs?: number;

    /** fetch implementation (default: global fetch) */
    readonly fetch?: typeof fetch;
}

const kGZIP_MAGIC = [0x1f, 0x8b] as const;

/**
 * Fill the month placeholders of an archive URL template.
 */
export function formatArchiveUrl(template: string, step: MonthStep): string {
    return template
        .replaceAll("{year}", String(step.year))
        .replaceAll("{month}", monthName(step.month));
}

function isGzip(bytes: Uint8Array): boolean {
    return bytes.length >= 2 && bytes[0] === kGZIP_MAGIC[0] && bytes[1] === kGZIP_MAGIC[1];
}

/**
 * HTTP archive client
 *
 * @example
 * ```typescript
 * const client = new ArchiveClient({
 *     monthlyUrl: "https://lists.example.org/archives/kernel/{year}-{month}.txt.gz",
 * });
 * const text = await client.fetchMonth({ year: 2022, month: 11 });
 * ```
 */
export class ArchiveClient implements MonthSource {
    private readonly monthlyUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: ArchiveClientOptions) {
        this.monthlyUrl = options.monthlyUrl;
        this.timeoutMs  = options.timeoutMs ?? 60_000;
        this.fetchImpl  = options.fetch ?? fetch;
    }

    async fetchMonth(step: MonthStep): Promise<string | null> {
        const url = formatArchiveUrl(this.monthlyUrl, step);

        let response: Response;
        try {
            response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
        }
        catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ArchiveFetchError(`Failed to download ${url}: ${reason}`, url);
        }

        if (response.status === 404) {
            return null;
        }

        if (!response.ok) {
            throw new ArchiveFetchError(
                `Failed to download ${url}: HTTP ${response.status} ${response.statusText}`,
                url,
                response.status
            );
        }

        const bytes = new Uint8Array(await response.arrayBuffer());

        // Some mirrors serve the file already inflated
        const text = isGzip(bytes) ? gunzipSync(bytes) : Buffer.from(bytes);
        return text.toString("utf-8");
    }
}
