const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parses a base-10 integer, allowing surrounding whitespace and a sign.
 * Returns null for anything else, including values outside the safe integer range.
 */
export function integerParse(raw: string): number | null {
    const trimmed = raw.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
        return null;
    }
    const parsed = Number(trimmed);
    if (!Number.isSafeInteger(parsed)) {
        return null;
    }
    return parsed;
}
