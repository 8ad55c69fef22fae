import type { Stats } from "../types.js";

/**
 * Merges two partial stats for the same category.
 * Associative and commutative, with statsEmpty() as identity.
 */
export function statsCombine(left: Stats, right: Stats): Stats {
    return {
        count: left.count + right.count,
        total: left.total + right.total,
        min: extremePick(left.min, right.min, (a, b) => a < b),
        max: extremePick(left.max, right.max, (a, b) => a > b)
    };
}

function extremePick(left: bigint | null, right: bigint | null, wins: (a: bigint, b: bigint) => boolean): bigint | null {
    if (left === null) {
        return right;
    }
    if (right === null) {
        return left;
    }
    return wins(right, left) ? right : left;
}
