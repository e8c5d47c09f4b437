/**
 * Archive month cache
 *
 * Keeps the text of downloaded monthly archives in a SQLite database
 * so bygone months are downloaded once. Keys are "YYYY-MM".
 *
 * Database location: <cache directory>/archive.db
 * Use ":memory:" for a throwaway cache.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";

/**
 * Stored month row
 */
interface MonthRow {
    month: string;
    content: string;
    fetched_at: string;
}

/**
 * Cache operations the archive provider relies on
 */
export interface MonthCache {
    open(): void;
    close(): void;
    get(month: string): string | null;
    has(month: string): boolean;
    put(month: string, content: string): void;
    clear(): number;
    count(): number;
}

export const kIN_MEMORY = ":memory:";

/**
 * SQLite-backed archive cache
 */
export class ArchiveCache implements MonthCache {
    private db: Database.Database | null = null;

    constructor(private readonly dbPath: string) {}

    /**
     * Open (and create, if needed) the cache database
     */
    open(): void {
        this.ensureOpen();
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    get isOpen(): boolean {
        return this.db !== null;
    }

    /**
     * Cached text of a month, or null
     */
    get(month: string): string | null {
        const row = this.ensureOpen()
            .prepare<[string], Pick<MonthRow, "content">>("SELECT content FROM archive_months WHERE month = ?")
            .get(month);
        return row?.content ?? null;
    }

    has(month: string): boolean {
        const row = this.ensureOpen()
            .prepare<[string], Pick<MonthRow, "month">>("SELECT month FROM archive_months WHERE month = ?")
            .get(month);
        return row !== undefined;
    }

    /**
     * Store (or replace) the text of a month
     */
    put(month: string, content: string, fetchedAt: Date = new Date()): void {
        this.ensureOpen()
            .prepare<[string, string, string]>(`
                INSERT INTO archive_months (month, content, fetched_at)
                VALUES (?, ?, ?)
                ON CONFLICT(month) DO UPDATE SET
                    content = excluded.content,
                    fetched_at = excluded.fetched_at
            `)
            .run(month, content, fetchedAt.toISOString());
    }

    /**
     * Remove every cached month
     *
     * @returns Number of months removed
     */
    clear(): number {
        return this.ensureOpen().prepare("DELETE FROM archive_months").run().changes;
    }

    count(): number {
        const row = this.ensureOpen()
            .prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM archive_months")
            .get();
        return row?.total ?? 0;
    }

    /**
     * Months currently cached, oldest first
     */
    months(): string[] {
        return this.ensureOpen()
            .prepare<[], Pick<MonthRow, "month">>("SELECT month FROM archive_months ORDER BY month")
            .all()
            .map(row => row.month);
    }

    private ensureOpen(): Database.Database {
        if (this.db) {
            return this.db;
        }

        if (this.dbPath !== kIN_MEMORY) {
            mkdirSync(dirname(this.dbPath), { recursive: true });
        }

        const db = new Database(this.dbPath);
        db.exec(`
            CREATE TABLE IF NOT EXISTS archive_months (
                month      TEXT PRIMARY KEY,
                content    TEXT NOT NULL,
                fetched_at TEXT NOT NULL
            )
        `);

        this.db = db;
        return db;
    }
}
