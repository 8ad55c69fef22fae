import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { TraceStatsError } from "../errors/traceStatsError.js";
import type { TraceStatsCliOptions, TraceStatsConfigResolved } from "../types.js";
import { traceStatsConfigResolve } from "./traceStatsConfigResolve.js";

/**
 * Reads the optional YAML config named by --config and merges the command-line flags over it.
 */
export async function traceStatsConfigRead(options: TraceStatsCliOptions): Promise<TraceStatsConfigResolved> {
    if (!options.config) {
        return traceStatsConfigResolve(undefined, options);
    }
    const configPath = options.config;

    let rawText: string;
    try {
        rawText = await readFile(configPath, "utf-8");
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "could not read config";
        throw new TraceStatsError("config_invalid", `Failed to read config at ${configPath}: ${details}`, {
            cause: error
        });
    }

    let parsed: unknown;
    try {
        parsed = parse(rawText);
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "invalid yaml";
        throw new TraceStatsError("config_invalid", `Failed to parse config at ${configPath}: ${details}`, {
            cause: error
        });
    }

    try {
        return traceStatsConfigResolve(parsed, options);
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "unknown config error";
        throw new TraceStatsError("config_invalid", `Invalid config at ${configPath}: ${details}`, { cause: error });
    }
}
