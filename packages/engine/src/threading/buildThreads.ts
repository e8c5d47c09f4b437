/**
 * @fileoverview Thread Builder
 *
 * Groups a flat collection of entities into threads. An entity is
 * linked to its parent and to every entity it references; the links
 * form an undirected graph whose connected components are the threads.
 *
 * @module @mltriage/engine/threading/buildThreads
 */

import type { ThreadLinkage } from "../contracts/ThreadLinkage.js";
import { DisjointSet } from "./DisjointSet.js";

/**
 * Build threads from a collection of entities.
 *
 * - Entities sharing a key collapse to the last one seen.
 * - Every entity is a node, so an entity with no links is a thread of one.
 * - Parent and reference keys that name no known entity are ignored.
 * - Threads come out in order of their first member in the input; each
 *   thread is sorted with `linkage.compare` (stable).
 *
 * The result is lazy and restartable: every iteration rebuilds the
 * graph from the current contents of `entities`.
 *
 * @param entities - Entities to thread
 * @param linkage - How entities name each other
 * @returns One array per thread
 *
 * @example
 * ```typescript
 * for (const thread of buildThreads(posts, postLinkage)) {
 *     console.log(thread.length, thread[0].metadata.title);
 * }
 * ```
 */
export function buildThreads<T>(entities: Iterable<T>, linkage: ThreadLinkage<T>): Iterable<T[]> {
    return {
        *[Symbol.iterator](): Iterator<T[]> {
            yield* collectThreads(entities, linkage);
        },
    };
}

function collectThreads<T>(entities: Iterable<T>, linkage: ThreadLinkage<T>): T[][] {
    // Arena of unique entities, keyed by graph key (last writer wins)
    const indexByKey = new Map<string, number>();
    const arena: T[] = [];

    for (const entity of entities) {
        const key = linkage.keyOf(entity);
        const existing = indexByKey.get(key);
        if (existing === undefined) {
            indexByKey.set(key, arena.length);
            arena.push(entity);
        }
        else {
            arena[existing] = entity;
        }
    }

    const sets = new DisjointSet(arena.length);

    arena.forEach((entity, index) => {
        const parentKey = linkage.parentOf(entity);
        if (parentKey !== null) {
            const parentIndex = indexByKey.get(parentKey);
            if (parentIndex !== undefined) {
                sets.union(index, parentIndex);
            }
        }

        for (const referenceKey of linkage.referencesOf(entity)) {
            const referenceIndex = indexByKey.get(referenceKey);
            if (referenceIndex !== undefined) {
                sets.union(index, referenceIndex);
            }
        }
    });

    return sets.groups().map(group =>
        group
            .map(index => arena[index])
            .sort((a, b) => linkage.compare(a, b))
    );
}
