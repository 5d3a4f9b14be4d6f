/**
 * Logger utility shared by every engine component.
 *
 * Usage:
 *   const log = createLogger('Resolver');
 *   log.info('Slot filled', { slotId });
 *   log.error('Commit failed', error);
 *
 * Output is filtered by LOG_LEVEL (debug | info | warn | error, default info).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
    return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

let activeLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
    activeLevel = level;
}

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];

export interface Logger {
    debug: (...args: unknown[]) => void;
    info: (...args: unknown[]) => void;
    warn: (...args: unknown[]) => void;
    error: (...args: unknown[]) => void;
}

export function createLogger(scope: string): Logger {
    const prefix = `[${scope}]`;
    return {
        debug: (...args: unknown[]) => {
            if (enabled('debug')) {
                console.debug('[DEBUG]', prefix, ...args);
            }
        },
        info: (...args: unknown[]) => {
            if (enabled('info')) {
                console.info('[INFO]', prefix, ...args);
            }
        },
        warn: (...args: unknown[]) => {
            if (enabled('warn')) {
                console.warn('[WARN]', prefix, ...args);
            }
        },
        error: (...args: unknown[]) => {
            if (enabled('error')) {
                console.error('[ERROR]', prefix, ...args);
            }
        },
    };
}

export const logger = createLogger('CancelFill');

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'apikey', 'privatekey', 'authtoken'];

/**
 * Masks sensitive fields (claim secrets, API keys, credentials) before logging.
 */
export function sanitizeForLog(data: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = { ...data };

    for (const key of Object.keys(sanitized)) {
        const normalized = key.toLowerCase();
        if (SENSITIVE_KEYS.some(sensitive => normalized.includes(sensitive))) {
            sanitized[key] = '[REDACTED]';
        }
    }

    return sanitized;
}
