import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { TraceStatsError } from "../errors/traceStatsError.js";
import { getLogger } from "../log.js";
import type { Triple } from "../types.js";
import { jqCommandBuild, jqFilterBuild } from "./jqFilterBuild.js";
import { jqTsvLineParse } from "./jqTsvLineParse.js";
import type { TokenSource } from "./tokenSource.js";

export type TokenizerExit = {
    code: number | null;
    signal: NodeJS.Signals | null;
    error?: Error;
};

export type TokenizerProcess = {
    lines: AsyncIterable<string>;
    exited: Promise<TokenizerExit>;
    kill: () => void;
};

export type JqTokenSourceOptions = {
    jqPath: string;
    tracePath: string;
    arrayKey: string;
    fields: readonly string[];
};

interface JqTokenSourceDependencies {
    processSpawn?: (command: string[]) => TokenizerProcess;
}

/**
 * Streams triples out of a JSON trace through `jq --stream`, one line at a time.
 * The whole document is never held in memory; jq's stderr goes straight to ours.
 */
export class JqTokenSource implements TokenSource {
    readonly name = "jq";
    private readonly command: string[];
    private readonly processSpawn: (command: string[]) => TokenizerProcess;
    private readonly logger = getLogger("source.jq");

    constructor(options: JqTokenSourceOptions, dependencies: JqTokenSourceDependencies = {}) {
        const filter = jqFilterBuild(options.arrayKey, options.fields);
        this.command = jqCommandBuild(options.jqPath, filter, options.tracePath);
        this.processSpawn = dependencies.processSpawn ?? jqProcessSpawn;
    }

    async *triples(signal?: AbortSignal): AsyncIterable<Triple> {
        this.logger.debug(`start: Spawning tokenizer command=${this.command[0] ?? ""}`);
        const child = this.processSpawn(this.command);
        let exited = false;
        let lineCount = 0;
        try {
            for await (const line of child.lines) {
                if (signal?.aborted) {
                    this.logger.debug(`abort: Tokenizer stopped lines=${lineCount}`);
                    return;
                }
                if (line.length === 0) {
                    continue;
                }
                lineCount += 1;
                yield jqTsvLineParse(line);
            }

            // Ctrl-C reaches jq too; its death by the same signal is not a tokenizer failure.
            if (signal?.aborted) {
                this.logger.debug(`abort: Tokenizer output ended after cancel lines=${lineCount}`);
                return;
            }

            const exit = await child.exited;
            exited = true;
            this.logger.debug(`exit: Tokenizer finished lines=${lineCount} code=${exit.code ?? "null"}`);
            jqExitCheck(exit, this.command[0] ?? "jq");
        } finally {
            if (!exited) {
                child.kill();
            }
        }
    }
}

function jqExitCheck(exit: TokenizerExit, executable: string): void {
    if (exit.error) {
        throw new TraceStatsError("tokenizer_unavailable", `failed to start ${executable}: ${exit.error.message}`, {
            cause: exit.error
        });
    }
    if (exit.code === 0) {
        return;
    }
    if (exit.code === null) {
        throw new TraceStatsError("tokenizer_failed", `${executable} was terminated by ${exit.signal ?? "a signal"}`);
    }
    throw new TraceStatsError("tokenizer_failed", `${executable} exited with code ${exit.code}`, {
        exitCode: exit.code
    });
}

function jqProcessSpawn(command: string[]): TokenizerProcess {
    const [executable, ...args] = command;
    if (!executable) {
        throw new Error("tokenizer executable is required");
    }

    const child = spawn(executable, args, {
        stdio: ["ignore", "pipe", "inherit"]
    });

    const exited = new Promise<TokenizerExit>((resolve) => {
        child.once("error", (error) => {
            resolve({ code: null, signal: null, error });
        });
        child.once("close", (code, signal) => {
            resolve({ code, signal });
        });
    });

    return {
        lines: createInterface({ input: child.stdout, crlfDelay: Number.POSITIVE_INFINITY }),
        exited,
        kill: () => {
            child.kill();
        }
    };
}
