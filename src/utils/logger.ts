// src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

/**
 * Console logger with ISO timestamp prefix
 *
 * Messages below `level` are dropped; 'silent' drops everything.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
    const threshold = LEVEL_ORDER[level];

    function write(messageLevel: Exclude<LogLevel, 'silent'>, message: string, meta: unknown[]): void {
        if (LEVEL_ORDER[messageLevel] < threshold) {
            return;
        }

        const line = `[${new Date().toISOString()}] ${messageLevel.toUpperCase()} ${message}`;
        switch (messageLevel) {
            case 'error':
                console.error(line, ...meta);
                break;
            case 'warn':
                console.warn(line, ...meta);
                break;
            default:
                console.log(line, ...meta);
        }
    }

    return {
        debug: (message, ...meta) => write('debug', message, meta),
        info: (message, ...meta) => write('info', message, meta),
        warn: (message, ...meta) => write('warn', message, meta),
        error: (message, ...meta) => write('error', message, meta)
    };
}

export const silentLogger: Logger = createLogger('silent');
