export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = {[key: string]: unknown};

/** Receives diagnostic records from the client. */
export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    context?: LogContext;
}

export function formatLogEntry(level: LogLevel, message: string, context?: LogContext): string {
    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
    };
    if (context !== undefined) {
        entry.context = context;
    }
    return JSON.stringify(entry);
}

/** Logger that writes one JSON object per line to stderr. Debug records are written only when the `DEBUG`
 * environment variable is set. */
export const stderrLogger: Logger = {
    debug(message, context) {
        if (process.env["DEBUG"]) {
            console.error(formatLogEntry("debug", message, context));
        }
    },
    info(message, context) {
        console.error(formatLogEntry("info", message, context));
    },
    warn(message, context) {
        console.error(formatLogEntry("warn", message, context));
    },
    error(message, context) {
        console.error(formatLogEntry("error", message, context));
    },
};
