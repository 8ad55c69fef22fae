import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";

export type LogConfig = {
    level: string;
    format: LogFormat;
    service: string;
};

const MODULE_WIDTH = 12;
const PRETTY_RESERVED_FIELDS = new Set(["pid", "hostname", "level", "time", "service", "module", "msg"]);
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

/**
 * Builds the process-wide logger once. Output always goes to stderr: stdout carries the report.
 */
export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }
    rootLogger = buildLogger(resolveLogConfig(overrides));
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

/**
 * Raises or lowers the level of the root logger and of children created afterwards.
 */
export function setLogLevel(level: string): void {
    initLogging().level = level;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const level =
        overrides.level ??
        envValue("TRACESTATS_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : "warn");
    const format = overrides.format ?? parseFormat(envValue("TRACESTATS_LOG_FORMAT")) ?? "pretty";
    const service = overrides.service ?? "tracestats";
    return { level, format, service };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { service: config.service },
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            return pino(
                options,
                prettyFactory({
                    colorize: !process.env.NO_COLOR,
                    hideObject: true,
                    ignore: "pid,hostname,service,module,time",
                    messageFormat: formatPrettyMessage,
                    destination: 2
                })
            );
        }
    }

    return pino(options, pino.destination(2));
}

/**
 * Renders `[module] message key=value ...` for pino-pretty.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const moduleName = normalizeModule(typeof log.module === "string" ? log.module : undefined);
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${formatDetailValue(value)}`);
    }
    const label = `[${moduleName.padEnd(MODULE_WIDTH, " ")}]`;
    return [label, message, ...details].filter((part) => part.length > 0).join(" ");
}

function formatDetailValue(value: unknown): string {
    if (value instanceof Error) {
        return JSON.stringify(value.message);
    }
    if (typeof value === "object" && value !== null) {
        if ("message" in value && typeof value.message === "string") {
            return JSON.stringify(value.message);
        }
        return JSON.stringify(value);
    }
    const text = String(value);
    return /[=\s]/.test(text) || text.length === 0 ? JSON.stringify(text) : text;
}

function normalizeModule(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    if (value === "pretty" || value === "json") {
        return value;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key]?.trim();
    return value && value.length > 0 ? value : null;
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
