/**
 * @fileoverview Unit tests for buildThreads
 *
 * Tests cover:
 * - Parent and reference links
 * - Unknown keys and duplicate keys
 * - Thread order and in-thread sorting
 * - Re-iteration
 *
 * @module @mltriage/engine/__tests__/buildThreads
 */

import { describe, it, expect } from "vitest";
import { buildThreads } from "../threading/buildThreads.js";
import type { ThreadLinkage } from "../contracts/ThreadLinkage.js";

interface Post {
    id: string;
    replyTo: string | null;
    quotes: string[];
    at: number;
    body?: string;
}

const postLinkage: ThreadLinkage<Post> = {
    keyOf       : (post) => post.id,
    parentOf    : (post) => post.replyTo,
    referencesOf: (post) => post.quotes,
    compare     : (a, b) => a.at - b.at,
};

function post(id: string, at: number, replyTo: string | null = null, quotes: string[] = []): Post {
    return { id, replyTo, quotes, at };
}

function ids(threads: Iterable<Post[]>): string[][] {
    return [...threads].map(thread => thread.map(p => p.id));
}

describe("buildThreads", () => {
    // Scenario: Replies join their parent
    it("should group replies with their parent", () => {
        const posts = [
            post("a", 1),
            post("b", 2, "a"),
            post("c", 3),
        ];

        expect(ids(buildThreads(posts, postLinkage))).toEqual([["a", "b"], ["c"]]);
    });

    // Scenario: References link even without a parent
    it("should link entities through references", () => {
        const posts = [
            post("a", 1),
            post("b", 2, "missing", ["a"]),
        ];

        expect(ids(buildThreads(posts, postLinkage))).toEqual([["a", "b"]]);
    });

    // Scenario: Links to unknown keys are ignored
    it("should keep an entity whose parent is unknown as its own thread", () => {
        const posts = [post("a", 1, "gone", ["also-gone"])];

        expect(ids(buildThreads(posts, postLinkage))).toEqual([["a"]]);
    });

    // Scenario: Threads sorted internally by compare
    it("should sort each thread with the linkage comparator", () => {
        const posts = [
            post("reply", 5, "root"),
            post("root", 1),
            post("late", 9, "reply"),
        ];

        expect(ids(buildThreads(posts, postLinkage))).toEqual([["root", "reply", "late"]]);
    });

    // Scenario: Duplicate keys collapse to the last one seen
    it("should keep the last entity for a duplicated key", () => {
        const first = { ...post("a", 1), body: "first" };
        const second = { ...post("a", 1), body: "second" };

        const threads = [...buildThreads([first, second], postLinkage)];

        expect(threads).toHaveLength(1);
        expect(threads[0]).toHaveLength(1);
        expect(threads[0][0].body).toBe("second");
    });

    // Scenario: Two roots bridged by one reply form one thread
    it("should merge threads bridged by a single entity", () => {
        const posts = [
            post("a", 1),
            post("b", 2),
            post("c", 3, "a", ["b"]),
        ];

        expect(ids(buildThreads(posts, postLinkage))).toEqual([["a", "b", "c"]]);
    });

    // Scenario: The result can be iterated more than once
    it("should rebuild the threads on every iteration", () => {
        const posts = [post("a", 1)];
        const threads = buildThreads(posts, postLinkage);

        expect(ids(threads)).toEqual([["a"]]);
        posts.push(post("b", 2, "a"));
        expect(ids(threads)).toEqual([["a", "b"]]);
    });

    // Scenario: Empty input
    it("should yield nothing for no entities", () => {
        expect(ids(buildThreads([], postLinkage))).toEqual([]);
    });
});
