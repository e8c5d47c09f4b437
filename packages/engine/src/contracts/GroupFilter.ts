/**
 * Group Filter Contract
 *
 * A predicate over a fully classified group (a thread after context
 * refinement). The engine only hands accepted groups to actions.
 */

/**
 * Group filter interface.
 *
 * @typeParam TGroup - The classified group type
 */
export interface GroupFilter<TGroup> {
    /** Unique identifier for this filter */
    readonly id: string;

    /**
     * Decide whether a group is interesting.
     *
     * @param group - The classified group
     * @returns True to keep the group
     */
    matches(group: TGroup): boolean;
}
