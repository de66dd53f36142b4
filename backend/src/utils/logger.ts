export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

type EmitLevel = Exclude<LogLevel, "silent">;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    child: (scope: string) => Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

// Resolved per call so console spies installed later still see output.
const WRITERS: Record<EmitLevel, (...args: unknown[]) => void> = {
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
};

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/** Null for anything that is not a level name. */
export function parseLogLevel(raw: string | undefined): LogLevel | null {
    const value = raw?.trim().toLowerCase();
    return value !== undefined && isLogLevel(value) ? value : null;
}

let currentLevel: LogLevel =
    parseLogLevel(process.env.LOG_LEVEL) ?? (process.env.NODE_ENV === "production" ? "info" : "debug");

/** Overrides LOG_LEVEL for the rest of the process (CLI flags). */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

function serializeError(value: unknown): unknown {
    return value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value;
}

function isContext(value: unknown): value is LogContext {
    return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

function write(level: EmitLevel, scope: string | null, message: string, args: unknown[]): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel]) {
        return;
    }

    const line = `[${level.toUpperCase()}] ${scope ? `[${scope}] ` : ""}${message}`;
    const rendered = args.map((arg, position) =>
        position === 0 && isContext(arg)
            ? Object.fromEntries(Object.entries(arg).map(([key, value]) => [key, serializeError(value)]))
            : serializeError(arg)
    );
    WRITERS[level](line, ...rendered);
}

export function createLogger(scope?: string): Logger {
    const own = scope?.trim() || null;
    return {
        debug: (message, ...args) => write("debug", own, message, args),
        info: (message, ...args) => write("info", own, message, args),
        warn: (message, ...args) => write("warn", own, message, args),
        error: (message, ...args) => write("error", own, message, args),
        child: (childScope) => createLogger(own ? `${own}.${childScope.trim()}` : childScope),
    };
}

export async function withLogTiming<T>(
    log: Logger,
    operation: string,
    run: () => Promise<T>,
    context: LogContext = {}
): Promise<T> {
    const startedAt = Date.now();
    log.debug(`${operation} started`, context);
    try {
        const result = await run();
        log.debug(`${operation} completed`, { ...context, durationMs: Date.now() - startedAt });
        return result;
    } catch (error) {
        log.error(`${operation} failed`, { ...context, durationMs: Date.now() - startedAt, error });
        throw error;
    }
}

export function logErrorWithContext(log: Logger, message: string, error: unknown, context: LogContext = {}): void {
    log.error(message, { ...context, error });
}

export const logger = createLogger("segmentshelf");
