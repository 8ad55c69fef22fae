import type { StatsSummary, TraceSortKey, TraceStatsRow } from "../types.js";

/**
 * Orders the final stats and keeps the first `limit` rows (0 keeps all).
 * Numeric keys sort descending, category ascending; ties keep first-seen order.
 */
export function reportRowsBuild(
    stats: ReadonlyMap<string, StatsSummary>,
    sort: TraceSortKey,
    limit: number
): TraceStatsRow[] {
    const rows = Array.from(stats, ([category, summary]) => ({ category, stats: summary }));
    rows.sort(reportRowsCompare(sort));
    return limit > 0 ? rows.slice(0, limit) : rows;
}

function reportRowsCompare(sort: TraceSortKey): (left: TraceStatsRow, right: TraceStatsRow) => number {
    switch (sort) {
        case "total":
            return (left, right) => bigintCompare(right.stats.total, left.stats.total);
        case "count":
            return (left, right) => right.stats.count - left.stats.count;
        case "avg":
            return (left, right) => right.stats.average - left.stats.average;
        case "op":
            return (left, right) => (left.category < right.category ? -1 : left.category > right.category ? 1 : 0);
    }
}

function bigintCompare(left: bigint, right: bigint): number {
    return left < right ? -1 : left > right ? 1 : 0;
}
