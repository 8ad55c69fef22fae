import { bigIntegerParse } from "../util/bigIntegerParse.js";

/**
 * Compares a filter field value with the configured target.
 * Both sides parsing as integers compare numerically ("01" matches "1"); otherwise the raw strings must be equal.
 */
export function recordFilterMatches(value: string, target: string): boolean {
    const left = bigIntegerParse(value);
    const right = bigIntegerParse(target);
    if (left !== null && right !== null) {
        return left === right;
    }
    return value === target;
}
