import type { Triple } from "../types.js";

/**
 * Lazy, finite producer of triples.
 * Iteration may throw a TraceStatsError once the producer fails; breaking out of the
 * loop early releases whatever the producer holds.
 */
export interface TokenSource {
    readonly name: string;
    triples(signal?: AbortSignal): AsyncIterable<Triple>;
}
