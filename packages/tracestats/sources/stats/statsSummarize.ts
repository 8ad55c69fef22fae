import type { Stats, StatsSummary } from "../types.js";

export function statsSummarize(stats: Stats): StatsSummary {
    return {
        count: stats.count,
        total: stats.total,
        average: averageCompute(stats.total, stats.count),
        min: stats.min,
        max: stats.max
    };
}

// Divides in bigint first so only the remainder goes through floating point.
function averageCompute(total: bigint, count: number): number {
    if (count === 0) {
        return 0;
    }
    const divisor = BigInt(count);
    return Number(total / divisor) + Number(total % divisor) / count;
}
