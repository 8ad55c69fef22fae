import { describe, expect, it } from "vitest";
import type { StatsSummary } from "../types.js";
import { reportRowsBuild } from "./reportRowsBuild.js";

function summary(count: number, total: number): StatsSummary {
    return { count, total: BigInt(total), average: total / count, min: 0n, max: BigInt(total) };
}

const STATS = new Map<string, StatsSummary>([
    ["PUSH1", summary(10, 30)],
    ["SSTORE", summary(1, 20000)],
    ["ADD", summary(4, 20)],
    ["CALL", summary(2, 5000)]
]);

function categories(sort: "total" | "count" | "avg" | "op", limit = 0): string[] {
    return reportRowsBuild(STATS, sort, limit).map((row) => row.category);
}

describe("reportRowsBuild", () => {
    it("sorts by total descending", () => {
        expect(categories("total")).toEqual(["SSTORE", "CALL", "PUSH1", "ADD"]);
    });

    it("sorts by count descending", () => {
        expect(categories("count")).toEqual(["PUSH1", "ADD", "CALL", "SSTORE"]);
    });

    it("sorts by average descending", () => {
        expect(categories("avg")).toEqual(["SSTORE", "CALL", "ADD", "PUSH1"]);
    });

    it("sorts by category ascending", () => {
        expect(categories("op")).toEqual(["ADD", "CALL", "PUSH1", "SSTORE"]);
    });

    it("keeps first-seen order on ties", () => {
        const tied = new Map<string, StatsSummary>([
            ["MUL", summary(1, 5)],
            ["ADD", summary(1, 5)],
            ["SUB", summary(1, 9)]
        ]);

        expect(reportRowsBuild(tied, "total", 0).map((row) => row.category)).toEqual(["SUB", "MUL", "ADD"]);
    });

    it("orders totals beyond the safe integer range exactly", () => {
        const large = new Map<string, StatsSummary>([
            ["CALL", { count: 1, total: 9007199254740992n, average: 9007199254740992, min: 0n, max: 0n }],
            ["CREATE", { count: 1, total: 9007199254740993n, average: 9007199254740992, min: 0n, max: 0n }]
        ]);

        expect(reportRowsBuild(large, "total", 0).map((row) => row.category)).toEqual(["CREATE", "CALL"]);
    });

    it("truncates after sorting", () => {
        expect(categories("total", 2)).toEqual(["SSTORE", "CALL"]);
        expect(categories("op", 10)).toHaveLength(4);
    });
});
