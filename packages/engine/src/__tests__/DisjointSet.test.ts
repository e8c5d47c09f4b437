/**
 * @fileoverview Unit tests for DisjointSet
 *
 * @module @mltriage/engine/__tests__/DisjointSet
 */

import { describe, it, expect } from "vitest";
import { DisjointSet } from "../threading/DisjointSet.js";

describe("DisjointSet", () => {
    // Scenario: Fresh set has one group per element
    it("should start with every element in its own set", () => {
        const sets = new DisjointSet(3);

        expect(sets.size).toBe(3);
        expect(sets.groups()).toEqual([[0], [1], [2]]);
    });

    // Scenario: Union merges, repeated union reports no change
    it("should report whether a union merged two sets", () => {
        const sets = new DisjointSet(4);

        expect(sets.union(0, 2)).toBe(true);
        expect(sets.union(2, 0)).toBe(false);
        expect(sets.connected(0, 2)).toBe(true);
        expect(sets.connected(0, 1)).toBe(false);
    });

    // Scenario: Connectivity is transitive
    it("should connect elements through a chain of unions", () => {
        const sets = new DisjointSet(5);

        sets.union(0, 1);
        sets.union(3, 4);
        sets.union(1, 4);

        expect(sets.connected(0, 3)).toBe(true);
        expect(sets.find(0)).toBe(sets.find(4));
    });

    // Scenario: Groups ordered by lowest element, members ascending
    it("should list groups by lowest element with ascending members", () => {
        const sets = new DisjointSet(6);

        sets.union(5, 1);
        sets.union(4, 0);
        sets.union(3, 5);

        expect(sets.groups()).toEqual([[0, 4], [1, 3, 5], [2]]);
    });

    // Scenario: Empty set
    it("should allow a set of size zero", () => {
        expect(new DisjointSet(0).groups()).toEqual([]);
    });

    // Scenario: Bad sizes and elements
    it("should reject invalid sizes and out-of-range elements", () => {
        expect(() => new DisjointSet(-1)).toThrow(RangeError);
        expect(() => new DisjointSet(1.5)).toThrow(RangeError);
        expect(() => new DisjointSet(2).find(2)).toThrow("Element 2 is outside [0, 2)");
    });
});
