export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Subset of the console API the engine writes to.
 */
export type EngineLogger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

const noop = (): void => {
};

/**
 * Console logger that drops messages below the given level.
 */
export function createConsoleLogger(level: LogLevel, target: EngineLogger = console): EngineLogger {
    const threshold = LOG_LEVELS.indexOf(level);
    const enabled = (messageLevel: LogLevel): boolean => LOG_LEVELS.indexOf(messageLevel) >= threshold;

    return {
        debug: enabled('debug') ? target.debug.bind(target) : noop,
        info: enabled('info') ? target.info.bind(target) : noop,
        warn: enabled('warn') ? target.warn.bind(target) : noop,
        error: enabled('error') ? target.error.bind(target) : noop,
    };
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}
