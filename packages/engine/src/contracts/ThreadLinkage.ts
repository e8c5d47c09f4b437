/**
 * Thread Linkage Contract
 *
 * Tells the thread builder how entities point at each other. Replies
 * name one parent and any number of earlier entities they reference;
 * the builder treats both kinds of link as undirected edges.
 */

/**
 * Linkage accessors for a threadable entity type.
 *
 * @typeParam T - The entity type being threaded
 *
 * @example
 * ```typescript
 * const postLinkage: ThreadLinkage<ForumPost> = {
 *     keyOf       : (post) => post.id,
 *     parentOf    : (post) => post.metadata.replyTo,
 *     referencesOf: (post) => post.metadata.quotes,
 *     compare     : (a, b) => a.metadata.postedAt.getTime() - b.metadata.postedAt.getTime(),
 * };
 * ```
 */
export interface ThreadLinkage<T> {
    /** Graph key of an entity */
    keyOf(entity: T): string;

    /** Key of the entity this one directly replies to, if any */
    parentOf(entity: T): string | null;

    /** Keys of every other entity this one refers to */
    referencesOf(entity: T): Iterable<string>;

    /** Ordering used inside a thread (chronological for mail) */
    compare(a: T, b: T): number;
}
