/**
 * Scoped, leveled logging to stderr
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

export interface Logger {
    error(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    debug(message: string, ...details: unknown[]): void;
}

/**
 * Logger writing `[scope] message` lines through console.error, so stdout stays free for program output
 */
export function createLogger(scope: string, level: LogLevel = 'warn'): Logger {
    const threshold = LEVEL_RANK[level];
    const write = (at: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void => {
        if (LEVEL_RANK[at] > threshold) return;
        console.error(`[${scope}] ${at.toUpperCase()} ${message}`, ...details);
    };

    return {
        error: (message, ...details) => write('error', message, details),
        warn: (message, ...details) => write('warn', message, details),
        info: (message, ...details) => write('info', message, details),
        debug: (message, ...details) => write('debug', message, details),
    };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
