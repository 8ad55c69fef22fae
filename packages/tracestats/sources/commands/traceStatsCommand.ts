import { stat } from "node:fs/promises";
import { traceStatsAggregate } from "../aggregate/traceStatsAggregate.js";
import { traceStatsConfigRead } from "../config/traceStatsConfigRead.js";
import { TraceStatsError } from "../errors/traceStatsError.js";
import { getLogger, setLogLevel } from "../log.js";
import { reportRender } from "../report/reportRender.js";
import { reportRowsBuild } from "../report/reportRowsBuild.js";
import { JqTokenSource, type JqTokenSourceOptions } from "../source/jqTokenSource.js";
import type { TokenSource } from "../source/tokenSource.js";
import type { TraceStatsCliOptions, TraceStatsResult } from "../types.js";
import { commandPathResolve } from "../util/commandPathResolve.js";

interface TraceStatsCommandDependencies {
    commandPathResolve?: (command: string) => Promise<string | null>;
    tokenSourceCreate?: (options: JqTokenSourceOptions) => TokenSource;
    outputWrite?: (lines: string[]) => void;
    signal?: AbortSignal;
}

/**
 * Aggregates per-opcode gas from a trace file and prints the report.
 * Nothing is printed when the run fails or is cancelled.
 * Expects: tracePath names a JSON trace with an array of step objects.
 */
export async function traceStatsCommand(
    tracePath: string,
    options: TraceStatsCliOptions,
    dependencies: TraceStatsCommandDependencies = {}
): Promise<TraceStatsResult> {
    const pathResolve = dependencies.commandPathResolve ?? commandPathResolve;
    const tokenSourceCreate =
        dependencies.tokenSourceCreate ?? ((sourceOptions: JqTokenSourceOptions) => new JqTokenSource(sourceOptions));
    const outputWrite = dependencies.outputWrite ?? traceStatsOutputWrite;

    if (options.verbose) {
        setLogLevel("debug");
    }
    const logger = getLogger("command");
    const config = await traceStatsConfigRead(options);

    const jqPath = await pathResolve(config.jqPath);
    if (!jqPath) {
        throw new TraceStatsError(
            "tokenizer_unavailable",
            `\`${config.jqPath}\` not found on PATH (required for streaming parse)`
        );
    }

    const traceStat = await stat(tracePath).catch(() => null);
    if (!traceStat?.isFile()) {
        throw new TraceStatsError("input_missing", `trace not found: ${tracePath}`);
    }

    const filter =
        config.filterValue === undefined ? undefined : { field: config.filterField, target: config.filterValue };
    const fields = [config.categoryField, config.valueField, ...(filter ? [filter.field] : [])];
    logger.debug(`start: Reading trace path=${tracePath} jq=${jqPath}`);

    const result = await traceStatsAggregate(
        tokenSourceCreate({ jqPath, tracePath, arrayKey: config.arrayKey, fields }),
        {
            categoryField: config.categoryField,
            valueField: config.valueField,
            filter,
            maxPending: config.maxPending,
            indexReuse: config.indexReuse,
            signal: dependencies.signal
        }
    );

    if (result.aborted) {
        logger.warn("abort: Cancelled before the trace was fully read; no report printed");
        return result;
    }

    const rows = reportRowsBuild(result.stats, config.sort, config.limit);
    outputWrite(reportRender(rows, config.output));
    return result;
}

function traceStatsOutputWrite(lines: string[]): void {
    if (lines.length === 0) {
        return;
    }
    process.stdout.write(`${lines.join("\n")}\n`);
}
