/**
 * Classifier Contract
 *
 * Classifiers look at a single entity and return a category tag.
 * They are pure functions - no side effects, no mutation, and no
 * knowledge of other entities. Context-aware refinement (threads,
 * replies) happens later, in the domain's group factory.
 *
 * Design principles:
 * - Pure: No side effects, no entity mutation
 * - Deterministic: Same input produces same output
 * - Local: Never consults other entities
 */

import type { Entity } from "./Entity.js";

/**
 * Classifier interface.
 *
 * @typeParam TEntity - The entity type this classifier understands
 * @typeParam TCategory - The tag type it produces
 *
 * @example
 * ```typescript
 * const questionClassifier: Classifier<ForumPost, "question" | "other"> = {
 *     id: "question-detector",
 *     name: "Question Detector",
 *     classify(post) {
 *         return post.metadata.title.endsWith("?") ? "question" : "other";
 *     },
 * };
 * ```
 */
export interface Classifier<TEntity extends Entity<object>, TCategory extends string> {
    /** Unique identifier for this classifier */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Optional description */
    readonly description?: string;

    /**
     * Classify an entity.
     *
     * @param entity - The entity to evaluate (read-only)
     * @returns The category for this entity
     */
    classify(entity: TEntity): TCategory;

    /**
     * Extract identifiers of the components an entity affects
     * (target branches, subsystems, releases).
     *
     * Optional: classifiers that cannot answer leave it out or return
     * an empty list, and callers must not depend on it.
     */
    extractAffectedComponents?(entity: TEntity): readonly string[];
}

/**
 * Type guard to check if an object is a Classifier.
 *
 * @param obj - The object to check
 * @returns True if the object implements Classifier
 */
export function isClassifier(obj: unknown): obj is Classifier<Entity<object>, string> {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "classify" in obj &&
        typeof obj.classify === "function"
    );
}
