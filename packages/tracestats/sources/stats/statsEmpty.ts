import type { Stats } from "../types.js";

/**
 * Returns the identity element for statsAdd and statsCombine.
 * Extremes stay null until the first value sets both.
 */
export function statsEmpty(): Stats {
    return {
        count: 0,
        total: 0n,
        min: null,
        max: null
    };
}
