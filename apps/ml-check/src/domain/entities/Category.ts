/**
 * @fileoverview Message categories
 *
 * A message holds exactly one category. Filters and views test
 * membership in a group of categories with `isAnyOf`.
 *
 * @module domain/entities/Category
 */

export const Category = {
    /** Noise on the list: discussion, replies without a review keyword */
    NotPatch        : "NotPatch",
    /** Introduction to a series, carries template markers instead of a diff */
    PatchCoverLetter: "PatchCoverLetter",
    /** A patch of a series (or a lone patch) */
    PatchN          : "PatchN",
    PatchAck        : "PatchAck",
    PatchNak        : "PatchNak",
    /** Maintainer reply stating the patch was applied */
    PatchApplied    : "PatchApplied",
} as const;

export type Category = (typeof Category)[keyof typeof Category];

export const ALL_CATEGORIES: readonly Category[] = Object.values(Category);

/** Categories a thread can be rooted on */
export const PATCH_CATEGORIES: ReadonlySet<Category> = new Set([
    Category.PatchCoverLetter,
    Category.PatchN,
]);

/** Categories that only make sense as a reply to a patch */
export const REVIEW_CATEGORIES: ReadonlySet<Category> = new Set([
    Category.PatchAck,
    Category.PatchNak,
    Category.PatchApplied,
]);

/**
 * Whether a category belongs to a group.
 *
 * @example
 * ```typescript
 * isAnyOf(message.category, REVIEW_CATEGORIES);
 * isAnyOf(message.category, [Category.PatchAck, Category.PatchNak]);
 * ```
 */
export function isAnyOf(category: Category, categories: Iterable<Category>): boolean {
    for (const candidate of categories) {
        if (candidate === category) {
            return true;
        }
    }
    return false;
}

export function isCategory(value: unknown): value is Category {
    return typeof value === "string" && ALL_CATEGORIES.some(category => category === value);
}
