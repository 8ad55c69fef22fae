/**
 * Builds the jq program that flattens `<arrayKey>[i].<field>` leaves into
 * `index<TAB>field<TAB>value` lines.
 * Only leaf events (length 2) at exactly `[arrayKey, index, field]` pass, so closing
 * events and nested values never reach the assembler.
 */
export function jqFilterBuild(arrayKey: string, fields: readonly string[]): string {
    if (fields.length === 0) {
        throw new Error("jq filter needs at least one field");
    }
    const fieldMatch = fields.map((field) => `.[0][2] == ${JSON.stringify(field)}`).join(" or ");
    return [
        `select(length == 2 and (.[0] | length) == 3 and .[0][0] == ${JSON.stringify(arrayKey)} and (${fieldMatch}))`,
        `[.[0][1], .[0][2], (.[1] | if type == "object" or type == "array" then tojson else . end)]`,
        "@tsv"
    ].join(" | ");
}

export function jqCommandBuild(jqPath: string, filter: string, tracePath: string): string[] {
    return [jqPath, "--stream", "-r", filter, tracePath];
}
