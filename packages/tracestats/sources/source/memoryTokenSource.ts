import type { Triple } from "../types.js";
import type { TokenSource } from "./tokenSource.js";

/**
 * Serves triples from memory, optionally failing after the last one.
 */
export class MemoryTokenSource implements TokenSource {
    readonly name = "memory";

    constructor(
        private readonly items: Iterable<Triple>,
        private readonly failure?: Error
    ) {}

    async *triples(signal?: AbortSignal): AsyncIterable<Triple> {
        for (const item of this.items) {
            if (signal?.aborted) {
                return;
            }
            yield item;
        }
        if (this.failure) {
            throw this.failure;
        }
    }
}
