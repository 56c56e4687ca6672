export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
    debug(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    error(message: string, context?: Record<string, unknown>): void;
}

const LEVELS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVELS, value);
}

/**
 * Creates a logger that writes through `console` at or above `level`.
 */
export function createConsoleLogger(level: LogLevel = "warn"): Logger {
    const threshold = LEVELS[level];
    const write =
        (at: Exclude<LogLevel, "silent">) =>
        (message: string, context?: Record<string, unknown>) => {
            if (LEVELS[at] < threshold) return;
            const line = `[rtdb-rest] ${message}`;
            if (context) {
                console[at](line, context);
            } else {
                console[at](line);
            }
        };

    return {
        debug: write("debug"),
        info: write("info"),
        warn: write("warn"),
        error: write("error"),
    };
}

/** Replaces the `auth` query parameter of a URL so tokens never reach logs. */
export function redactUrl(url: string): string {
    return url.replace(/([?&]auth=)[^&]*/, "$1<redacted>");
}
