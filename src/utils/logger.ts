export enum LogLevel {
    DEBUG = 'debug',
    INFO = 'info',
    WARN = 'warn',
    ERROR = 'error',
    SILENT = 'silent',
}

const PRIORITY: Record<LogLevel, number> = {
    [LogLevel.DEBUG]: 0,
    [LogLevel.INFO]: 1,
    [LogLevel.WARN]: 2,
    [LogLevel.ERROR]: 3,
    [LogLevel.SILENT]: 4,
};

/**
 * Parse a level name, falling back to INFO for anything unrecognized
 */
export function parseLogLevel(level: string | undefined): LogLevel {
    const normalized = (level ?? '').toLowerCase();
    const match = Object.values(LogLevel).find(value => value === normalized);
    return match ?? LogLevel.INFO;
}

/**
 * Leveled console logger shared by the engine and the CLI
 */
export class Logger {
    private level: LogLevel;

    constructor(level: LogLevel | string = LogLevel.INFO) {
        this.level = typeof level === 'string' ? parseLogLevel(level) : level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    private shouldLog(level: LogLevel): boolean {
        return PRIORITY[level] >= PRIORITY[this.level];
    }

    debug(message: string): void {
        if (this.shouldLog(LogLevel.DEBUG)) {
            console.log(`[DEBUG] ${message}`);
        }
    }

    info(message: string): void {
        if (this.shouldLog(LogLevel.INFO)) {
            console.log(`[INFO] ${message}`);
        }
    }

    warn(message: string): void {
        if (this.shouldLog(LogLevel.WARN)) {
            console.error(`[WARN] ${message}`);
        }
    }

    error(message: string): void {
        if (this.shouldLog(LogLevel.ERROR)) {
            console.error(`[ERROR] ${message}`);
        }
    }
}

/**
 * Build the process logger from CLI flags and NOTESYNC_LOG_LEVEL
 */
export function createLogger(options: { verbose?: boolean; quiet?: boolean } = {}): Logger {
    if (options.verbose) return new Logger(LogLevel.DEBUG);
    if (options.quiet) return new Logger(LogLevel.WARN);
    return new Logger(parseLogLevel(process.env.NOTESYNC_LOG_LEVEL));
}
