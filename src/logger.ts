// ============================================================================
// Herald — Logger
// Component-scoped structured logger with levels
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel) {
    currentLevel = level;
}

function formatTimestamp(): string {
    return new Date().toISOString();
}

function log(level: Exclude<LogLevel, 'silent'>, component: string, message: string, data?: Record<string, unknown>) {
    if (levels[level] < levels[currentLevel]) return;

    const prefix = `[${formatTimestamp()}] [${level.toUpperCase()}] [${component}]`;
    const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

    // One record per line for line-oriented collectors (journald, docker logs)
    if (data) {
        logFn(`${prefix} ${message}`, JSON.stringify(data));
    } else {
        logFn(`${prefix} ${message}`);
    }
}

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => log('debug', component, msg, data),
        info: (msg, data) => log('info', component, msg, data),
        warn: (msg, data) => log('warn', component, msg, data),
        error: (msg, data) => log('error', component, msg, data),
    };
}
