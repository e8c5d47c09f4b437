/**
 * @fileoverview Disjoint Set (union-find)
 *
 * Index-based union-find with path compression and union by size.
 * Elements are the integers [0, size); callers keep their own
 * key → index arena.
 *
 * @module @mltriage/engine/threading/DisjointSet
 */

export class DisjointSet {
    private readonly parent: number[];
    private readonly sizes: number[];

    constructor(size: number) {
        if (!Number.isInteger(size) || size < 0) {
            throw new RangeError(`DisjointSet size must be a non-negative integer, got ${size}`);
        }

        this.parent = Array.from({ length: size }, (_, index) => index);
        this.sizes = new Array<number>(size).fill(1);
    }

    /** Number of elements */
    get size(): number {
        return this.parent.length;
    }

    /**
     * Find the representative of an element's set.
     */
    find(element: number): number {
        this.assertElement(element);

        let root = element;
        while (this.parent[root] !== root) {
            root = this.parent[root];
        }

        // Path compression
        let current = element;
        while (this.parent[current] !== root) {
            const next = this.parent[current];
            this.parent[current] = root;
            current = next;
        }

        return root;
    }

    /**
     * Merge the sets of two elements.
     *
     * @returns True if the elements were in different sets
     */
    union(a: number, b: number): boolean {
        let rootA = this.find(a);
        let rootB = this.find(b);

        if (rootA === rootB) {
            return false;
        }

        if (this.sizes[rootA] < this.sizes[rootB]) {
            [rootA, rootB] = [rootB, rootA];
        }

        this.parent[rootB] = rootA;
        this.sizes[rootA] += this.sizes[rootB];
        return true;
    }

    /**
     * Whether two elements share a set.
     */
    connected(a: number, b: number): boolean {
        return this.find(a) === this.find(b);
    }

    /**
     * Group all elements by set.
     *
     * Sets appear in order of their lowest element, and each set lists
     * its elements in ascending order.
     */
    groups(): number[][] {
        const byRoot = new Map<number, number[]>();

        for (let element = 0; element < this.parent.length; element++) {
            const root = this.find(element);
            const group = byRoot.get(root);
            if (group) {
                group.push(element);
            }
            else {
                byRoot.set(root, [element]);
            }
        }

        return [...byRoot.values()];
    }

    private assertElement(element: number): void {
        if (!Number.isInteger(element) || element < 0 || element >= this.parent.length) {
            throw new RangeError(`Element ${element} is outside [0, ${this.parent.length})`);
        }
    }
}
