import type { LogContext, Logger, LogLevel } from "../../logger.js";

export type LogRecord = {
    level: LogLevel,
    message: string,
    context: LogContext | undefined,
};

export class RecordingLogger implements Logger {
    readonly records: Array<LogRecord> = [];

    debug(message: string, context?: LogContext): void {
        this.records.push({level: "debug", message, context});
    }

    info(message: string, context?: LogContext): void {
        this.records.push({level: "info", message, context});
    }

    warn(message: string, context?: LogContext): void {
        this.records.push({level: "warn", message, context});
    }

    error(message: string, context?: LogContext): void {
        this.records.push({level: "error", message, context});
    }

    messages(level: LogLevel): Array<string> {
        return this.records.filter((record) => record.level === level).map((record) => record.message);
    }
}
