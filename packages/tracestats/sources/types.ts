export interface Triple {
    index: number;
    field: string;
    value: string;
}

export interface CompletedRecord {
    category: string;
    value: bigint;
}

/**
 * Running statistics for one category. Treated as a value: every update
 * produces a new object. Costs and totals are bigint so sums past 2^53 stay exact;
 * min and max are null until the first value.
 */
export interface Stats {
    readonly count: number;
    readonly total: bigint;
    readonly min: bigint | null;
    readonly max: bigint | null;
}

export interface StatsSummary {
    count: number;
    total: bigint;
    average: number;
    min: bigint | null;
    max: bigint | null;
}

export type TraceSortKey = "total" | "count" | "avg" | "op";

export type TraceOutputMode = "table" | "tsv";

export type IndexReusePolicy = "fresh" | "strict";

export interface RecordFilter {
    field: string;
    target: string;
}

export interface RecordAssemblerOptions {
    categoryField: string;
    valueField: string;
    filter?: RecordFilter;
    maxPending: number;
    indexReuse: IndexReusePolicy;
}

export interface RecordAssemblerCounters {
    completed: number;
    filtered: number;
    malformed: number;
}

export interface TraceStatsCliOptions {
    depth?: string;
    sort?: string;
    limit?: string;
    tsv?: boolean;
    config?: string;
    maxPending?: string;
    strictIndices?: boolean;
    verbose?: boolean;
}

export interface TraceStatsConfigResolved {
    arrayKey: string;
    categoryField: string;
    valueField: string;
    filterField: string;
    filterValue?: string;
    sort: TraceSortKey;
    limit: number;
    output: TraceOutputMode;
    maxPending: number;
    indexReuse: IndexReusePolicy;
    jqPath: string;
}

export interface TraceStatsRow {
    category: string;
    stats: StatsSummary;
}

export interface TraceStatsResult {
    stats: Map<string, StatsSummary>;
    counters: RecordAssemblerCounters;
    pendingDiscarded: number;
    aborted: boolean;
}
