import { describe, expect, it } from "vitest";
import { statsAdd } from "./statsAdd.js";
import { statsEmpty } from "./statsEmpty.js";

describe("statsAdd", () => {
    it("sets both extremes from the first value", () => {
        expect(statsAdd(statsEmpty(), 7n)).toEqual({ count: 1, total: 7n, min: 7n, max: 7n });
    });

    it("tracks negative maxima", () => {
        const stats = statsAdd(statsAdd(statsEmpty(), -4n), -9n);
        expect(stats).toEqual({ count: 2, total: -13n, min: -9n, max: -4n });
    });

    it("keeps totals exact past 2^53", () => {
        const stats = statsAdd(statsAdd(statsEmpty(), 9007199254740991n), 2n);
        expect(stats.total).toBe(9007199254740993n);
    });

    it("does not mutate the input", () => {
        const initial = statsEmpty();
        statsAdd(initial, 3n);
        expect(initial.count).toBe(0);
    });
});
