const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parses a base-10 integer of any size, allowing surrounding whitespace and a sign.
 * Returns null for anything else.
 */
export function bigIntegerParse(raw: string): bigint | null {
    const trimmed = raw.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
        return null;
    }
    return BigInt(trimmed);
}
