export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    timestamp: number;
    level: LogLevel;
    message: string;
    data?: unknown;
}

type LogListener = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

class LoggerService {
    private listeners: LogListener[] = [];
    private minLevel: LogLevel = 'info';
    private consoleEnabled = true;

    public subscribe(listener: LogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public setLevel(level: LogLevel) {
        this.minLevel = level;
    }

    /**
     * The terminal renderer owns stdout while it runs, so the CLI turns
     * console output off and relies on the file sink instead.
     */
    public setConsoleEnabled(enabled: boolean) {
        this.consoleEnabled = enabled;
    }

    private emit(level: LogLevel, message: string, data?: unknown) {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

        const entry: LogEntry = {
            timestamp: Date.now(),
            level,
            message,
            data
        };
        if (this.consoleEnabled) {
            console[level](`[${level.toUpperCase()}] ${message}`, data ?? '');
        }

        this.listeners.forEach(l => l(entry));
    }

    public info(msg: string, data?: unknown) { this.emit('info', msg, data); }
    public warn(msg: string, data?: unknown) { this.emit('warn', msg, data); }
    public error(msg: string, data?: unknown) { this.emit('error', msg, data); }
    public debug(msg: string, data?: unknown) { this.emit('debug', msg, data); }
}

export const Logger = new LoggerService();

/**
 * Formats an entry as a single log-file line, e.g. `12:04:05 INFO [LRCLIB] Searching`.
 */
export function formatLogEntry(entry: LogEntry): string {
    const time = new Date(entry.timestamp).toTimeString().slice(0, 8);
    let line = `${time} ${entry.level.toUpperCase()} ${entry.message}`;
    if (entry.data !== undefined) {
        line += ` ${describeData(entry.data)}`;
    }
    return line;
}

function describeData(data: unknown): string {
    if (data instanceof Error) return `${data.name}: ${data.message}`;
    if (typeof data === 'string') return data;
    try {
        return JSON.stringify(data);
    } catch {
        return String(data);
    }
}
