/**
 * @fileoverview Review statistics
 *
 * Aggregates how long patch sets wait for review and who reviews them.
 * Only patch sets with an epoch are counted.
 *
 * @module domain/stats/generateStats
 */

import type { DateTime } from "luxon";
import type { MailMessage } from "../entities/MailMessage.js";
import type { PatchSet } from "../patchsets/PatchSet.js";

/** `[sender, count]`; `["", 0]` when nobody qualifies */
export type TopSender = readonly [string, number];

export interface ReviewStats {
    readonly totalPatchSets: number;
    readonly totalApplied: number;
    readonly medianAgeDays: number;
    readonly medianMessagesPerPatchSet: number;
    readonly topSubmitter: TopSender;
    readonly topAcker: TopSender;
    readonly topNaker: TopSender;
    readonly topApplier: TopSender;
    /** 0 when nothing was acked */
    readonly medianDaysToFirstAck: number;
    readonly medianDaysToFirstNak: number;
    readonly medianDaysToApplied: number;
}

const kMS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Whole days from `start` to `end`, rounded down.
 */
function daysBetween(start: DateTime, end: DateTime): number {
    return Math.floor((end.toMillis() - start.toMillis()) / kMS_PER_DAY);
}

/**
 * Median of a list; the mean of the middle pair for even lengths.
 * An empty list has median 0.
 */
export function median(values: readonly number[]): number {
    if (values.length === 0) {
        return 0;
    }

    const sorted = [...values].sort((a, b) => a - b);
    const middle = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 1
        ? sorted[middle]
        : (sorted[middle - 1] + sorted[middle]) / 2;
}

/**
 * Most frequent sender. Ties go to the sender seen first.
 */
export function topSender(messages: readonly MailMessage[]): TopSender {
    const counts = new Map<string, number>();
    for (const message of messages) {
        const sender = message.metadata.sender ?? "";
        counts.set(sender, (counts.get(sender) ?? 0) + 1);
    }

    let top: TopSender = ["", 0];
    for (const [sender, count] of counts) {
        if (count > top[1]) {
            top = [sender, count];
        }
    }
    return top;
}

/**
 * Aggregate review statistics.
 *
 * @param patchSets - Patch sets to summarize
 * @param now - Reference time for ages
 * @returns Statistics, or null when no patch set has an epoch
 */
export function generateStats(patchSets: Iterable<PatchSet>, now: DateTime): ReviewStats | null {
    const valid: Array<{ patchSet: PatchSet; epoch: MailMessage }> = [];
    for (const patchSet of patchSets) {
        const epoch = patchSet.epochPatch;
        if (epoch !== null) {
            valid.push({ patchSet, epoch });
        }
    }

    if (valid.length === 0) {
        return null;
    }

    const daysToFirst = (pick: (patchSet: PatchSet) => readonly MailMessage[]): number[] =>
        valid.flatMap(({ patchSet, epoch }) => {
            const first = pick(patchSet)[0];
            return first === undefined ? [] : [daysBetween(epoch.metadata.timestamp, first.metadata.timestamp)];
        });

    return {
        totalPatchSets           : valid.length,
        totalApplied             : valid.filter(({ patchSet }) => patchSet.applieds.length > 0).length,
        medianAgeDays            : median(valid.map(({ epoch }) => daysBetween(epoch.metadata.timestamp, now))),
        medianMessagesPerPatchSet: median(valid.map(({ patchSet }) => patchSet.length)),
        topSubmitter             : topSender(valid.map(({ epoch }) => epoch)),
        topAcker                 : topSender(valid.flatMap(({ patchSet }) => patchSet.acks)),
        topNaker                 : topSender(valid.flatMap(({ patchSet }) => patchSet.naks)),
        topApplier               : topSender(valid.flatMap(({ patchSet }) => patchSet.applieds)),
        medianDaysToFirstAck     : median(daysToFirst(patchSet => patchSet.acks)),
        medianDaysToFirstNak     : median(daysToFirst(patchSet => patchSet.naks)),
        medianDaysToApplied      : median(daysToFirst(patchSet => patchSet.applieds)),
    };
}
