import { TRACE_EXIT_FAILURE, TRACE_EXIT_USAGE } from "../constants.js";
import type { TraceStatsResult } from "../types.js";

export type TraceStatsErrorKind =
    | "tokenizer_unavailable"
    | "input_missing"
    | "config_invalid"
    | "tokenizer_failed"
    | "tokenizer_protocol"
    | "pending_overflow"
    | "index_reused";

/**
 * Error raised for every fatal aggregation failure.
 * Expects: kind is stable and drives the process exit code.
 */
export class TraceStatsError extends Error {
    readonly kind: TraceStatsErrorKind;
    readonly exitCode?: number;
    readonly partial?: TraceStatsResult;

    constructor(
        kind: TraceStatsErrorKind,
        message: string,
        options?: { exitCode?: number; partial?: TraceStatsResult; cause?: unknown }
    ) {
        super(message, { cause: options?.cause });
        this.name = "TraceStatsError";
        this.kind = kind;
        this.exitCode = options?.exitCode;
        this.partial = options?.partial;
    }
}

/**
 * Maps an error thrown anywhere in a run to the process exit code.
 */
export function traceStatsExitCodeResolve(error: unknown): number {
    if (!(error instanceof TraceStatsError)) {
        return TRACE_EXIT_FAILURE;
    }
    switch (error.kind) {
        case "tokenizer_unavailable":
        case "input_missing":
        case "config_invalid":
            return TRACE_EXIT_USAGE;
        case "tokenizer_failed":
            return error.exitCode !== undefined && error.exitCode > 0 ? error.exitCode : TRACE_EXIT_FAILURE;
        default:
            return TRACE_EXIT_FAILURE;
    }
}
