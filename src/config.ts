import {createConsoleLogger, EngineLogger, isLogLevel, LogLevel} from "./logger";

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export interface EngineConfig {
    /**
     * Number of transactions processed between two progress events and cancellation checks.
     */
    readonly chunkSize: number;
    readonly logLevel: LogLevel;
}

export interface EngineOptions {
    readonly chunkSize?: number;
    readonly logLevel?: LogLevel;

    /**
     * Replaces the console logger. logLevel is ignored when a logger is given.
     */
    readonly logger?: EngineLogger;

    /**
     * Clock used by the today/yesterday/tomorrow operators and for statistics timestamps.
     */
    readonly now?: () => Date;
}

/**
 * Resolves the engine configuration: explicit options first, then RULES_CHUNK_SIZE and RULES_LOG_LEVEL, then defaults.
 * Unusable environment values are ignored.
 */
export function resolveEngineConfig(options: EngineOptions = {}, env: NodeJS.ProcessEnv = process.env): EngineConfig {
    return {
        chunkSize: options.chunkSize ?? parseChunkSize(env.RULES_CHUNK_SIZE) ?? DEFAULT_CHUNK_SIZE,
        logLevel: options.logLevel ?? parseLogLevel(env.RULES_LOG_LEVEL) ?? DEFAULT_LOG_LEVEL,
    };
}

export function resolveLogger(options: EngineOptions = {}, env: NodeJS.ProcessEnv = process.env): EngineLogger {
    return options.logger ?? createConsoleLogger(resolveEngineConfig(options, env).logLevel);
}

function parseChunkSize(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') {
        return undefined;
    }
    const parsed = Number(value);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
    const normalized = value?.trim().toLowerCase();
    return normalized && isLogLevel(normalized) ? normalized : undefined;
}
