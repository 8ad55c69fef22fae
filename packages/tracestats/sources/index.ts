export { traceStatsAggregate, type TraceStatsAggregateOptions } from "./aggregate/traceStatsAggregate.js";
export { RecordAssembler } from "./assembler/recordAssembler.js";
export { recordFilterMatches } from "./assembler/recordFilterMatches.js";
export { traceStatsConfigRead } from "./config/traceStatsConfigRead.js";
export { traceStatsConfigResolve } from "./config/traceStatsConfigResolve.js";
export { TraceStatsError, type TraceStatsErrorKind, traceStatsExitCodeResolve } from "./errors/traceStatsError.js";
export { reportRender, reportTableRender, reportTsvRender } from "./report/reportRender.js";
export { reportRowsBuild } from "./report/reportRowsBuild.js";
export { JqTokenSource, type JqTokenSourceOptions, type TokenizerProcess } from "./source/jqTokenSource.js";
export { MemoryTokenSource } from "./source/memoryTokenSource.js";
export type { TokenSource } from "./source/tokenSource.js";
export { StatsAggregator } from "./stats/statsAggregator.js";
export { statsAdd } from "./stats/statsAdd.js";
export { statsCombine } from "./stats/statsCombine.js";
export { statsEmpty } from "./stats/statsEmpty.js";
export { statsSummarize } from "./stats/statsSummarize.js";
export type * from "./types.js";
