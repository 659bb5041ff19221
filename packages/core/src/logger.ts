export type LogLevel = "debug" | "info" | "warn" | "error" | "disaster";

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    context?: Record<string, unknown>;
}

export type LogSink = (line: string, entry: LogEntry) => void;

const SEVERITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    disaster: 4,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

/**
 * Structured JSON logger. Every line goes to stderr unless a sink is
 * installed; stdout belongs to whatever protocol the host process speaks.
 */
export class Logger {
    private static sink: LogSink = (line) => console.error(line);
    private static floor: LogLevel = "info";

    static setSink(sink: LogSink | undefined): void {
        Logger.sink = sink ?? ((line) => console.error(line));
    }

    static setLevel(level: LogLevel): void {
        Logger.floor = level;
    }

    static level(): LogLevel {
        return Logger.floor;
    }

    private static emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (SEVERITY[level] < SEVERITY[Logger.floor] && !(level === "debug" && process.env['DEBUG'])) {
            return;
        }
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            message,
        };
        if (context) {
            entry.context = context;
        }
        Logger.sink(JSON.stringify(entry), entry);
    }

    static debug(message: string, context?: Record<string, unknown>) {
        this.emit("debug", message, context);
    }

    static info(message: string, context?: Record<string, unknown>) {
        this.emit("info", message, context);
    }

    static warn(message: string, context?: Record<string, unknown>) {
        this.emit("warn", message, context);
    }

    static error(message: string, context?: Record<string, unknown>) {
        this.emit("error", message, context);
    }

    /** Something the process cannot continue after. */
    static disaster(message: string, context?: Record<string, unknown>) {
        this.emit("disaster", message, context);
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
