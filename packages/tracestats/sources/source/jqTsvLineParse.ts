import { TraceStatsError } from "../errors/traceStatsError.js";
import type { Triple } from "../types.js";
import { integerParse } from "../util/integerParse.js";

const TSV_ESCAPES: Record<string, string> = {
    t: "\t",
    n: "\n",
    r: "\r",
    "\\": "\\"
};

/**
 * Parses one `index<TAB>field<TAB>value` line written by jq's @tsv.
 * Expects: line is not empty.
 */
export function jqTsvLineParse(line: string): Triple {
    const firstTab = line.indexOf("\t");
    const secondTab = firstTab === -1 ? -1 : line.indexOf("\t", firstTab + 1);
    if (secondTab === -1) {
        throw new TraceStatsError("tokenizer_protocol", `expected three tab-separated columns, got: ${line}`);
    }

    const index = integerParse(line.slice(0, firstTab));
    if (index === null || index < 0) {
        throw new TraceStatsError("tokenizer_protocol", `record index is not a non-negative integer: ${line}`);
    }

    return {
        index,
        field: jqTsvUnescape(line.slice(firstTab + 1, secondTab)),
        value: jqTsvUnescape(line.slice(secondTab + 1))
    };
}

export function jqTsvUnescape(value: string): string {
    return value.replace(/\\([tnr\\])/g, (match, code: string) => TSV_ESCAPES[code] ?? match);
}
