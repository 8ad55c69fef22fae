#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { Command } from "commander";
import { z } from "zod";
import { traceStatsCommand } from "./commands/traceStatsCommand.js";
import { TRACESTATS_NAME } from "./constants.js";
import { traceStatsExitCodeResolve } from "./errors/traceStatsError.js";
import { initLogging } from "./log.js";
import type { TraceStatsCliOptions } from "./types.js";

const pkg = z
    .object({ version: z.string() })
    .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

const HELP_EPILOG = `
Output columns:
  op, count, total, avg, min, max

gasCost is whatever the tracer reports per step. For CALL-like opcodes it can
include gas forwarded to the callee, so totals may exceed the transaction's
gasUsed; use --depth to analyze one call frame at a time.

Requirements:
  jq on PATH (the trace is streamed through \`jq --stream\`, never loaded whole)

Examples:
  tracestats trace.json
  tracestats trace.json --limit 30
  tracestats trace.json --sort count --limit 50
  tracestats trace.json --depth 1
  tracestats trace.json --tsv > opcode_gas.tsv
`;

initLogging();

const program = new Command();

program
    .name(TRACESTATS_NAME)
    .description("Aggregate per-opcode gasCost from a geth-style opcode trace JSON")
    .version(pkg.version)
    .argument("<trace>", "Path to trace JSON (e.g. trace.json)")
    .option("--depth <depth>", "Only include steps with this call depth (e.g. 1 for top-level)")
    .option("--sort <key>", "Sort output by: total, count, avg or op (default: total)")
    .option("--limit <rows>", "Limit rows (0 = no limit)")
    .option("--tsv", "Output as TSV: op<TAB>count<TAB>total<TAB>avg<TAB>min<TAB>max")
    .option("-c, --config <path>", "YAML config with field names and defaults")
    .option("--max-pending <records>", "Fail when more records than this are incomplete at once (0 = no bound)")
    .option("--strict-indices", "Fail when a record index appears again after it completed")
    .option("-v, --verbose", "Log progress to stderr")
    .addHelpText("after", HELP_EPILOG)
    .action(async (tracePath: string, options: TraceStatsCliOptions) => {
        const controller = new AbortController();
        const abort = () => controller.abort();
        process.once("SIGINT", abort);
        process.once("SIGTERM", abort);
        try {
            const result = await traceStatsCommand(tracePath, options, { signal: controller.signal });
            if (result.aborted) {
                process.exitCode = 130;
            }
        } finally {
            process.off("SIGINT", abort);
            process.off("SIGTERM", abort);
        }
    });

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

try {
    await program.parseAsync(process.argv);
} catch (error) {
    const details = error instanceof Error && error.message ? error.message : "unknown error";
    console.error(`${TRACESTATS_NAME} failed: ${details}`);
    process.exit(traceStatsExitCodeResolve(error));
}
