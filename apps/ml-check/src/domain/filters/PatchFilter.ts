/**
 * @fileoverview Patch Filter
 *
 * Implements the GroupFilter contract: selects the patch sets a
 * reviewer should look at.
 *
 * @module domain/filters/PatchFilter
 */

import type { DateTime } from "luxon";
import type { GroupFilter } from "@mltriage/engine";
import type { PatchSet } from "../patchsets/PatchSet.js";
import { senderAddress } from "../utils/mailHeaders.js";

export const FilterMode = {
    /** Every patch set with an epoch */
    All         : "all",
    /** No naks and fewer acks than required */
    NeedsAcks   : "needs-acks",
    /** No naks and enough acks */
    ReadyToApply: "ready-to-apply",
    Applied     : "applied",
    /** Nak'd and never applied */
    Rejected    : "rejected",
} as const;

export type FilterMode = (typeof FilterMode)[keyof typeof FilterMode];

export const FILTER_MODES: readonly FilterMode[] = Object.values(FilterMode);

export function isFilterMode(value: unknown): value is FilterMode {
    return typeof value === "string" && FILTER_MODES.some(mode => mode === value);
}

const kDEFAULT_REQUIRED_ACKS = 2;

/**
 * Configuration for PatchFilter
 */
export interface PatchFilterOptions {
    /** Defaults to "needs-acks" */
    readonly mode?: string;

    /** Acks a patch set needs before it can be applied (default: 2) */
    readonly requiredAcks?: number;

    /** Patch sets whose epoch is older are rejected (default: none) */
    readonly since?: DateTime | null;

    /**
     * Addresses whose acks take a patch set out of the "needs-acks"
     * list. Matched case-insensitively against the ack's sender.
     */
    readonly ignoreAckers?: readonly string[];
}

/**
 * Patch Filter
 *
 * @example
 * ```typescript
 * const filter = new PatchFilter({
 *     mode        : "ready-to-apply",
 *     requiredAcks: 2,
 *     since       : DateTime.utc().minus({ days: 14 }),
 * });
 *
 * const ready = patchSets.filter(patchSet => filter.matches(patchSet));
 * ```
 */
export class PatchFilter implements GroupFilter<PatchSet> {
    readonly id = "patch-filter";

    readonly mode: FilterMode;
    readonly requiredAcks: number;
    readonly since: DateTime | null;
    readonly ignoreAckers: readonly string[];

    /**
     * @throws RangeError on an unknown mode or a negative or
     *   fractional ack threshold
     */
    constructor(options: PatchFilterOptions = {}) {
        const mode = options.mode ?? FilterMode.NeedsAcks;
        if (!isFilterMode(mode)) {
            throw new RangeError(`Unknown filter mode "${mode}", expected one of: ${FILTER_MODES.join(", ")}`);
        }

        const requiredAcks = options.requiredAcks ?? kDEFAULT_REQUIRED_ACKS;
        if (!Number.isInteger(requiredAcks) || requiredAcks < 0) {
            throw new RangeError(`Required acks must be a non-negative integer, got ${requiredAcks}`);
        }

        this.mode         = mode;
        this.requiredAcks = requiredAcks;
        this.since        = options.since ?? null;
        this.ignoreAckers = (options.ignoreAckers ?? []).map(senderAddress);
    }

    matches(patchSet: PatchSet): boolean {
        const epoch = patchSet.epochPatch;
        if (epoch === null) {
            return false;
        }

        if (this.since !== null && epoch.metadata.timestamp.toMillis() < this.since.toMillis()) {
            return false;
        }

        const acks = patchSet.acks.length;
        const naks = patchSet.naks.length;
        const applied = patchSet.applieds.length;

        switch (this.mode) {
            case FilterMode.All:
                return true;
            case FilterMode.NeedsAcks:
                return naks === 0 && acks < this.requiredAcks && !this.hasIgnoredAck(patchSet);
            case FilterMode.ReadyToApply:
                return naks === 0 && acks >= this.requiredAcks;
            case FilterMode.Applied:
                return applied > 0;
            case FilterMode.Rejected:
                return applied === 0 && naks > 0;
        }
    }

    private hasIgnoredAck(patchSet: PatchSet): boolean {
        if (this.ignoreAckers.length === 0) {
            return false;
        }

        return patchSet.acks.some(ack => {
            const sender = ack.metadata.sender;
            return sender !== null && this.ignoreAckers.includes(senderAddress(sender));
        });
    }
}
