/**
 * Entity Contract
 *
 * The base shape of anything that flows through the triage pipeline.
 * Domain implementations extend this with domain-specific metadata.
 *
 * Entities are immutable within the pipeline. Classification never
 * mutates an entity; it produces a copy carrying the new tag.
 */

/**
 * Base entity that all domain entities must satisfy.
 *
 * @typeParam TMetadata - Domain-specific metadata type
 *
 * @example
 * ```typescript
 * interface PostMetadata {
 *     author: string;
 *     title: string;
 *     postedAt: Date;
 * }
 *
 * interface ForumPost extends Entity<PostMetadata> {}
 * ```
 */
export interface Entity<TMetadata extends object = Record<string, unknown>> {
    /** Unique identifier for this entity (graph key when threading) */
    readonly id: string;

    /** Primary content to be evaluated (message body, post text, etc.) */
    readonly content: string;

    /** Domain-specific metadata */
    readonly metadata: TMetadata;

    /** Trace ID assigned by the engine for observability */
    readonly traceId?: string;
}
