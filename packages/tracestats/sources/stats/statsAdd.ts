import type { Stats } from "../types.js";

/**
 * Folds one value into stats and returns the new stats.
 */
export function statsAdd(stats: Stats, value: bigint): Stats {
    return {
        count: stats.count + 1,
        total: stats.total + value,
        min: stats.min === null || value < stats.min ? value : stats.min,
        max: stats.max === null || value > stats.max ? value : stats.max
    };
}
