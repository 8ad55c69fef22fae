import { z } from "zod";
import {
    TRACE_ARRAY_KEY_DEFAULT,
    TRACE_CATEGORY_FIELD_DEFAULT,
    TRACE_FILTER_FIELD_DEFAULT,
    TRACE_JQ_PATH_DEFAULT,
    TRACE_MAX_PENDING_DEFAULT,
    TRACE_VALUE_FIELD_DEFAULT
} from "../constants.js";
import { TraceStatsError } from "../errors/traceStatsError.js";
import type { TraceStatsCliOptions, TraceStatsConfigResolved } from "../types.js";
import { integerParse } from "../util/integerParse.js";

const SORT_KEYS = ["total", "count", "avg", "op"] as const;

const traceStatsConfigSchema = z
    .object({
        arrayKey: z.string().min(1).optional(),
        categoryField: z.string().min(1).optional(),
        valueField: z.string().min(1).optional(),
        filterField: z.string().min(1).optional(),
        filterValue: z.union([z.string().min(1), z.number().int()]).optional(),
        sort: z.enum(SORT_KEYS).optional(),
        limit: z.number().int().min(0).optional(),
        output: z.enum(["table", "tsv"]).optional(),
        maxPending: z.number().int().min(0).optional(),
        indexReuse: z.enum(["fresh", "strict"]).optional(),
        jqPath: z.string().min(1).optional()
    })
    .strict();

/**
 * Resolves file config and command-line flags into a fully defaulted config.
 * Flags win over file values. Expects: rawConfig is the parsed config file or undefined.
 */
export function traceStatsConfigResolve(
    rawConfig: unknown,
    options: TraceStatsCliOptions = {}
): TraceStatsConfigResolved {
    const parsed = traceStatsConfigSchema.safeParse(rawConfig ?? {});
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
            .join("; ");
        throw new TraceStatsError("config_invalid", `invalid config: ${details}`);
    }
    const file = parsed.data;

    const filterValue = options.depth !== undefined ? cliIntegerParse("--depth", options.depth, false) : file.filterValue;

    return {
        arrayKey: file.arrayKey ?? TRACE_ARRAY_KEY_DEFAULT,
        categoryField: file.categoryField ?? TRACE_CATEGORY_FIELD_DEFAULT,
        valueField: file.valueField ?? TRACE_VALUE_FIELD_DEFAULT,
        filterField: file.filterField ?? TRACE_FILTER_FIELD_DEFAULT,
        filterValue: filterValue === undefined ? undefined : String(filterValue),
        sort: options.sort !== undefined ? cliSortParse(options.sort) : (file.sort ?? "total"),
        limit: options.limit !== undefined ? cliIntegerParse("--limit", options.limit, true) : (file.limit ?? 0),
        output: options.tsv ? "tsv" : (file.output ?? "table"),
        maxPending:
            options.maxPending !== undefined
                ? cliIntegerParse("--max-pending", options.maxPending, true)
                : (file.maxPending ?? TRACE_MAX_PENDING_DEFAULT),
        indexReuse: options.strictIndices ? "strict" : (file.indexReuse ?? "fresh"),
        jqPath: file.jqPath ?? TRACE_JQ_PATH_DEFAULT
    };
}

function cliSortParse(raw: string): TraceStatsConfigResolved["sort"] {
    const match = SORT_KEYS.find((key) => key === raw);
    if (!match) {
        throw new TraceStatsError("config_invalid", `--sort must be one of ${SORT_KEYS.join(", ")}, got "${raw}"`);
    }
    return match;
}

function cliIntegerParse(flag: string, raw: string, nonNegative: boolean): number {
    const parsed = integerParse(raw);
    if (parsed === null || (nonNegative && parsed < 0)) {
        const expected = nonNegative ? "a non-negative integer" : "an integer";
        throw new TraceStatsError("config_invalid", `${flag} must be ${expected}, got "${raw}"`);
    }
    return parsed;
}
