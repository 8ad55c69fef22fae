import { RecordAssembler } from "../assembler/recordAssembler.js";
import { TraceStatsError } from "../errors/traceStatsError.js";
import { getLogger } from "../log.js";
import type { TokenSource } from "../source/tokenSource.js";
import { StatsAggregator } from "../stats/statsAggregator.js";
import type { RecordAssemblerOptions, TraceStatsResult } from "../types.js";

export type TraceStatsAggregateOptions = RecordAssemblerOptions & {
    signal?: AbortSignal;
};

/**
 * Pulls every triple from the source and folds completed records into per-category stats.
 * Records still incomplete when the source ends or the signal aborts are dropped uncounted.
 * A failing source is rethrown as TraceStatsError with the partial result attached,
 * unless the signal already aborted: then the run ends as cancelled.
 */
export async function traceStatsAggregate(
    source: TokenSource,
    options: TraceStatsAggregateOptions
): Promise<TraceStatsResult> {
    const logger = getLogger("aggregate");
    const { signal, ...assemblerOptions } = options;
    const assembler = new RecordAssembler(assemblerOptions);
    const aggregator = new StatsAggregator();

    const resultBuild = (aborted: boolean): TraceStatsResult => ({
        stats: aggregator.finalize(),
        counters: assembler.counters,
        pendingDiscarded: assembler.discardPending(),
        aborted
    });

    logger.debug(`start: Aggregating source=${source.name} fields=${assembler.requiredFields.join(",")}`);

    try {
        for await (const triple of source.triples(signal)) {
            if (signal?.aborted) {
                break;
            }
            const record = assembler.ingest(triple);
            if (record) {
                aggregator.record(record.category, record.value);
            }
        }
    } catch (error) {
        if (!signal?.aborted) {
            throw traceStatsFailure(error, source.name, resultBuild(false));
        }
        logger.debug({ error }, "abort: Source failed after cancellation");
    }

    const result = resultBuild(signal?.aborted ?? false);
    logger.debug(
        {
            categories: result.stats.size,
            completed: result.counters.completed,
            filtered: result.counters.filtered,
            malformed: result.counters.malformed,
            pendingDiscarded: result.pendingDiscarded
        },
        result.aborted ? "abort: Aggregation stopped early" : "done: Aggregation finished"
    );
    if (result.pendingDiscarded > 0 && !result.aborted) {
        logger.warn(`event: Dropped ${result.pendingDiscarded} incomplete record(s) at end of input`);
    }
    return result;
}

function traceStatsFailure(error: unknown, sourceName: string, partial: TraceStatsResult): TraceStatsError {
    if (error instanceof TraceStatsError) {
        return new TraceStatsError(error.kind, error.message, {
            exitCode: error.exitCode,
            partial,
            cause: error
        });
    }
    const details = error instanceof Error && error.message ? error.message : "unknown source error";
    return new TraceStatsError("tokenizer_failed", `token source ${sourceName} failed: ${details}`, {
        partial,
        cause: error
    });
}
