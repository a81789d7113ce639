/**
 * Pino Logger Factory
 *
 * Structured logging for the pipeline. Components take a `StudyForgeLogger`
 * at construction and bind their own context through `child`.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
    level?: LogLevel;
    /** Route output through pino-pretty (development only) */
    pretty?: boolean;
    /** Bindings included in every line */
    base?: Record<string, unknown>;
}

export interface StudyForgeLogger {
    trace(msg: string, data?: Record<string, unknown>): void;
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, err?: Error | Record<string, unknown>): void;
    child(bindings: Record<string, unknown>): StudyForgeLogger;
}

export function createLogger(config: LoggerConfig = {}): StudyForgeLogger {
    const options: LoggerOptions = {
        level: config.level ?? "info",
        base: { service: "study-forge", ...config.base },
    };

    if (config.pretty) {
        options.transport = {
            target: "pino-pretty",
            options: {
                colorize: true,
                translateTime: "SYS:standard",
                ignore: "pid,hostname",
            },
        };
    }

    return wrapLogger(pino(options));
}

/** Logger that drops everything; the default for library consumers */
export function createSilentLogger(): StudyForgeLogger {
    return wrapLogger(pino({ level: "silent" }));
}

function wrapLogger(logger: Logger): StudyForgeLogger {
    return {
        trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
        debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
        info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
        warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
        error: (msg, err) => {
            if (err instanceof Error) {
                logger.error({ err }, msg);
            } else if (err) {
                logger.error(err, msg);
            } else {
                logger.error(msg);
            }
        },
        child: (bindings) => wrapLogger(logger.child(bindings)),
    };
}
