// dnsplan/src/lib/logger.ts — minimal leveled logger

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
    debug: (message: string) => void;
    info: (message: string) => void;
    warn: (message: string) => void;
    error: (message: string) => void;
}

const LEVELS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

/**
 * Console-backed logger. Messages below `level` are dropped; `prefix` is
 * prepended to every line.
 */
export function createConsoleLogger(options: { level?: LogLevel; prefix?: string } = {}): Logger {
    const threshold = LEVELS[options.level ?? 'info'];
    const prefix = options.prefix ? `[${options.prefix}] ` : '';
    const emit = (level: Exclude<LogLevel, 'silent'>, sink: (line: string) => void) =>
        (message: string): void => {
            if (LEVELS[level] < threshold) return;
            sink(`${prefix}${level.toUpperCase()} ${message}`);
        };

    return {
        debug: emit('debug', line => console.debug(line)),
        info: emit('info', line => console.info(line)),
        warn: emit('warn', line => console.warn(line)),
        error: emit('error', line => console.error(line)),
    };
}

export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};
