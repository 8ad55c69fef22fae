import { describe, expect, it } from "vitest";
import { statsAdd } from "./statsAdd.js";
import { statsCombine } from "./statsCombine.js";
import { statsEmpty } from "./statsEmpty.js";
import type { Stats } from "../types.js";

function statsFrom(values: bigint[]): Stats {
    return values.reduce(statsAdd, statsEmpty());
}

describe("statsCombine", () => {
    it("matches folding the concatenated values", () => {
        const combined = statsCombine(statsFrom([3n, 10n]), statsFrom([1n, 5n, 2n]));
        expect(combined).toEqual(statsFrom([3n, 10n, 1n, 5n, 2n]));
        expect(combined).toEqual({ count: 5, total: 21n, min: 1n, max: 10n });
    });

    it("treats empty stats as identity", () => {
        const stats = statsFrom([4n, 6n]);
        expect(statsCombine(statsEmpty(), stats)).toEqual(stats);
        expect(statsCombine(stats, statsEmpty())).toEqual(stats);
    });

    it("is commutative", () => {
        const left = statsFrom([8n]);
        const right = statsFrom([2n, 9n]);
        expect(statsCombine(left, right)).toEqual(statsCombine(right, left));
    });
});
