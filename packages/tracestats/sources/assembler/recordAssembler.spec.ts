import { describe, expect, it } from "vitest";
import { TraceStatsError } from "../errors/traceStatsError.js";
import type { RecordAssemblerOptions, Triple } from "../types.js";
import { RecordAssembler } from "./recordAssembler.js";

function assemblerCreate(overrides: Partial<RecordAssemblerOptions> = {}): RecordAssembler {
    return new RecordAssembler({
        categoryField: "op",
        valueField: "gasCost",
        maxPending: 0,
        indexReuse: "fresh",
        ...overrides
    });
}

function triple(index: number, field: string, value: string): Triple {
    return { index, field, value };
}

describe("RecordAssembler", () => {
    it("emits a record once category and value have arrived", () => {
        const assembler = assemblerCreate();

        expect(assembler.ingest(triple(0, "op", "ADD"))).toBeNull();
        expect(assembler.pendingCount).toBe(1);
        expect(assembler.ingest(triple(0, "gasCost", "3"))).toEqual({ category: "ADD", value: 3n });
        expect(assembler.pendingCount).toBe(0);
        expect(assembler.counters).toEqual({ completed: 1, filtered: 0, malformed: 0 });
    });

    it("reassembles interleaved records", () => {
        const assembler = assemblerCreate();
        const results = [
            triple(0, "op", "ADD"),
            triple(1, "op", "MUL"),
            triple(1, "gasCost", "5"),
            triple(0, "gasCost", "3")
        ].map((item) => assembler.ingest(item));

        expect(results).toEqual([null, null, { category: "MUL", value: 5n }, { category: "ADD", value: 3n }]);
    });

    it("keeps the last value written for a field", () => {
        const assembler = assemblerCreate({ filter: { field: "depth", target: "1" } });

        assembler.ingest(triple(0, "op", "ADD"));
        assembler.ingest(triple(0, "op", "SUB"));
        assembler.ingest(triple(0, "gasCost", "3"));

        expect(assembler.ingest(triple(0, "depth", "1"))).toEqual({ category: "SUB", value: 3n });
    });

    it("drops a record whose filter field does not match", () => {
        const assembler = assemblerCreate({ filter: { field: "depth", target: "1" } });

        assembler.ingest(triple(1, "op", "ADD"));
        assembler.ingest(triple(1, "gasCost", "5"));
        expect(assembler.pendingCount).toBe(1);
        expect(assembler.ingest(triple(1, "depth", "2"))).toBeNull();

        expect(assembler.pendingCount).toBe(0);
        expect(assembler.counters).toEqual({ completed: 0, filtered: 1, malformed: 0 });
    });

    it("drops a record with an unparseable value without affecting others", () => {
        const assembler = assemblerCreate();

        assembler.ingest(triple(3, "op", "SUB"));
        expect(assembler.ingest(triple(3, "gasCost", "not-a-number"))).toBeNull();
        assembler.ingest(triple(4, "op", "ADD"));

        expect(assembler.ingest(triple(4, "gasCost", "2"))).toEqual({ category: "ADD", value: 2n });
        expect(assembler.counters).toEqual({ completed: 1, filtered: 0, malformed: 1 });
    });

    it("checks the filter before parsing the value", () => {
        const assembler = assemblerCreate({ filter: { field: "depth", target: "1" } });

        assembler.ingest(triple(0, "op", "ADD"));
        assembler.ingest(triple(0, "depth", "2"));
        assembler.ingest(triple(0, "gasCost", "oops"));

        expect(assembler.counters).toEqual({ completed: 0, filtered: 1, malformed: 0 });
    });

    it("keeps values beyond the safe integer range", () => {
        const assembler = assemblerCreate();

        assembler.ingest(triple(0, "op", "CALL"));

        expect(assembler.ingest(triple(0, "gasCost", "9007199254740993"))).toEqual({
            category: "CALL",
            value: 9007199254740993n
        });
        expect(assembler.counters.malformed).toBe(0);
    });

    it("ignores the filter field when no filter is configured", () => {
        const assembler = assemblerCreate();

        expect(assembler.requiredFields).toEqual(["op", "gasCost"]);
        assembler.ingest(triple(0, "depth", "7"));
        assembler.ingest(triple(0, "op", "ADD"));
        expect(assembler.ingest(triple(0, "gasCost", "3"))).toEqual({ category: "ADD", value: 3n });
    });

    it("starts a fresh record when a completed index reappears", () => {
        const assembler = assemblerCreate();

        assembler.ingest(triple(0, "op", "ADD"));
        assembler.ingest(triple(0, "gasCost", "3"));
        expect(assembler.ingest(triple(0, "gasCost", "9"))).toBeNull();
        expect(assembler.pendingCount).toBe(1);
        expect(assembler.ingest(triple(0, "op", "MUL"))).toEqual({ category: "MUL", value: 9n });
    });

    it("rejects a reappearing index in strict mode", () => {
        const assembler = assemblerCreate({ indexReuse: "strict" });

        assembler.ingest(triple(0, "op", "ADD"));
        assembler.ingest(triple(0, "gasCost", "3"));

        expect(() => assembler.ingest(triple(0, "gasCost", "9"))).toThrow(TraceStatsError);
        expect(() => assembler.ingest(triple(0, "op", "ADD"))).toThrow("record index 0 appeared again");
    });

    it("fails once too many records are in flight", () => {
        const assembler = assemblerCreate({ maxPending: 2 });

        assembler.ingest(triple(0, "op", "ADD"));
        assembler.ingest(triple(1, "op", "ADD"));
        assembler.ingest(triple(1, "gasCost", "1"));
        assembler.ingest(triple(2, "op", "ADD"));

        let caught: unknown;
        try {
            assembler.ingest(triple(3, "op", "ADD"));
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(TraceStatsError);
        expect(caught instanceof TraceStatsError ? caught.kind : null).toBe("pending_overflow");
    });

    it("discards incomplete records without counting them", () => {
        const assembler = assemblerCreate();

        assembler.ingest(triple(0, "op", "ADD"));
        assembler.ingest(triple(1, "gasCost", "4"));

        expect(assembler.discardPending()).toBe(2);
        expect(assembler.pendingCount).toBe(0);
        expect(assembler.counters).toEqual({ completed: 0, filtered: 0, malformed: 0 });
    });
});
