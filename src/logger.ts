/**
 * Structured application logging.
 *
 * Request lines come from `hono/logger`; everything else goes through this
 * interface as one JSON object per line.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
    info(event: string, context?: LogContext): void;
    warn(event: string, context?: LogContext): void;
    error(event: string, context?: LogContext): void;
}

type LogLevel = 'info' | 'warn' | 'error';

function serializeContext(context: LogContext): LogContext {
    const result: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
        result[key] = value instanceof Error
            ? { name: value.name, message: value.message }
            : value;
    }
    return result;
}

function write(level: LogLevel, event: string, context?: LogContext): void {
    const line = JSON.stringify({
        level,
        event,
        time: new Date().toISOString(),
        ...(context ? serializeContext(context) : {}),
    });

    if (level === 'error') {
        console.error(line);
    } else if (level === 'warn') {
        console.warn(line);
    } else {
        console.log(line);
    }
}

export function createConsoleLogger(): Logger {
    return {
        info: (event, context) => write('info', event, context),
        warn: (event, context) => write('warn', event, context),
        error: (event, context) => write('error', event, context),
    };
}

/**
 * Shorten an opaque user id for logs. Full ids are bearer credentials.
 */
export function redactId(id: string): string {
    return id.length <= 6 ? '***' : `${id.slice(0, 6)}…`;
}
