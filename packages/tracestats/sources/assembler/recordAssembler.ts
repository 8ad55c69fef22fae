import { TraceStatsError } from "../errors/traceStatsError.js";
import type { CompletedRecord, RecordAssemblerCounters, RecordAssemblerOptions, Triple } from "../types.js";
import { bigIntegerParse } from "../util/bigIntegerParse.js";
import { recordFilterMatches } from "./recordFilterMatches.js";

/**
 * Rebuilds records from streamed triples and resolves each one exactly once.
 * A record completes when every required field has arrived; it is then emitted or
 * dropped (filter mismatch, unparseable value) and its slot is freed.
 *
 * Expects: the source delivers all fields of a record within a bounded window;
 * maxPending turns a violation into a pending_overflow error.
 */
export class RecordAssembler {
    private readonly pending = new Map<number, Map<string, string>>();
    private readonly required: string[];
    private readonly completedIndices: Set<number> | null;
    private readonly stats: RecordAssemblerCounters = { completed: 0, filtered: 0, malformed: 0 };

    constructor(private readonly options: RecordAssemblerOptions) {
        const required = [options.categoryField, options.valueField];
        if (options.filter) {
            required.push(options.filter.field);
        }
        this.required = [...new Set(required)];
        this.completedIndices = options.indexReuse === "strict" ? new Set() : null;
    }

    get requiredFields(): readonly string[] {
        return this.required;
    }

    get pendingCount(): number {
        return this.pending.size;
    }

    get counters(): RecordAssemblerCounters {
        return { ...this.stats };
    }

    ingest(triple: Triple): CompletedRecord | null {
        const record = this.pendingResolve(triple.index);
        record.set(triple.field, triple.value);

        for (const field of this.required) {
            if (!record.has(field)) {
                return null;
            }
        }

        this.pending.delete(triple.index);
        this.completedIndices?.add(triple.index);

        const filter = this.options.filter;
        if (filter && !recordFilterMatches(fieldGet(record, filter.field), filter.target)) {
            this.stats.filtered += 1;
            return null;
        }

        const value = bigIntegerParse(fieldGet(record, this.options.valueField));
        if (value === null) {
            this.stats.malformed += 1;
            return null;
        }

        this.stats.completed += 1;
        return {
            category: fieldGet(record, this.options.categoryField),
            value
        };
    }

    /**
     * Drops every record still in flight and returns how many were dropped.
     */
    discardPending(): number {
        const count = this.pending.size;
        this.pending.clear();
        return count;
    }

    private pendingResolve(index: number): Map<string, string> {
        const existing = this.pending.get(index);
        if (existing) {
            return existing;
        }
        if (this.completedIndices?.has(index)) {
            throw new TraceStatsError("index_reused", `record index ${index} appeared again after it completed`);
        }
        const maxPending = this.options.maxPending;
        if (maxPending > 0 && this.pending.size >= maxPending) {
            throw new TraceStatsError(
                "pending_overflow",
                `more than ${maxPending} records in flight at index ${index}; fields of one record are too far apart`
            );
        }
        const created = new Map<string, string>();
        this.pending.set(index, created);
        return created;
    }
}

function fieldGet(record: Map<string, string>, field: string): string {
    return record.get(field) ?? "";
}
