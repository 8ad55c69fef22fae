import type { Stats, StatsSummary } from "../types.js";
import { statsAdd } from "./statsAdd.js";
import { statsCombine } from "./statsCombine.js";
import { statsEmpty } from "./statsEmpty.js";
import { statsSummarize } from "./statsSummarize.js";

/**
 * Per-category running statistics for one aggregation pass.
 * Entries are created on the first value for a category and never removed.
 */
export class StatsAggregator {
    private readonly entries = new Map<string, Stats>();

    record(category: string, value: bigint): void {
        this.entries.set(category, statsAdd(this.entries.get(category) ?? statsEmpty(), value));
    }

    /**
     * Folds another aggregator into this one, category by category.
     */
    merge(other: StatsAggregator): void {
        for (const [category, stats] of other.entries) {
            this.entries.set(category, statsCombine(this.entries.get(category) ?? statsEmpty(), stats));
        }
    }

    get size(): number {
        return this.entries.size;
    }

    finalize(): Map<string, StatsSummary> {
        const result = new Map<string, StatsSummary>();
        for (const [category, stats] of this.entries) {
            result.set(category, statsSummarize(stats));
        }
        return result;
    }
}
