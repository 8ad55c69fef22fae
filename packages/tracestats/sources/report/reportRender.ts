import type { TraceOutputMode, TraceStatsRow } from "../types.js";

const AVG_WIDTH = 10;

export function reportRender(rows: TraceStatsRow[], output: TraceOutputMode): string[] {
    return output === "tsv" ? reportTsvRender(rows) : reportTableRender(rows);
}

/**
 * One `op<TAB>count<TAB>total<TAB>avg<TAB>min<TAB>max` line per row, no header.
 */
export function reportTsvRender(rows: TraceStatsRow[]): string[] {
    return rows.map(({ category, stats }) =>
        [
            category,
            String(stats.count),
            String(stats.total),
            averageFormat(stats.average),
            extremeFormat(stats.min),
            extremeFormat(stats.max)
        ].join("\t")
    );
}

/**
 * Aligned table with a header line. Category is left-aligned, numbers right-aligned.
 */
export function reportTableRender(rows: TraceStatsRow[]): string[] {
    const widths = {
        op: columnWidth(2, rows.map((row) => row.category)),
        count: columnWidth(5, rows.map((row) => String(row.stats.count))),
        total: columnWidth(5, rows.map((row) => String(row.stats.total))),
        min: columnWidth(3, rows.map((row) => extremeFormat(row.stats.min))),
        max: columnWidth(3, rows.map((row) => extremeFormat(row.stats.max)))
    };

    const line = (op: string, count: string, total: string, avg: string, min: string, max: string): string =>
        [
            op.padEnd(widths.op),
            count.padStart(widths.count),
            total.padStart(widths.total),
            avg.padStart(AVG_WIDTH),
            min.padStart(widths.min),
            max.padStart(widths.max)
        ].join("  ");

    return [
        line("op", "count", "total", "avg", "min", "max"),
        ...rows.map(({ category, stats }) =>
            line(
                category,
                String(stats.count),
                String(stats.total),
                averageFormat(stats.average),
                extremeFormat(stats.min),
                extremeFormat(stats.max)
            )
        )
    ];
}

function columnWidth(minimum: number, cells: string[]): number {
    return cells.reduce((width, cell) => Math.max(width, cell.length), minimum);
}

/**
 * One decimal place. Exact binary ties (x.25) round half to even, which toFixed does not do;
 * magnitudes from 1e21 up are printed in full instead of exponent form.
 */
function averageFormat(average: number): string {
    if (Math.abs(average) >= 1e21) {
        return `${BigInt(average)}.0`;
    }
    if (Math.abs(average % 1) === 0.25) {
        return `${average < 0 ? "-" : ""}${Math.trunc(Math.abs(average))}.2`;
    }
    return average.toFixed(1);
}

function extremeFormat(value: bigint | null): string {
    return value === null ? "" : value.toString();
}
