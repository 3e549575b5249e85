import * as path from 'path';
import winston from 'winston';
import Transport from 'winston-transport';

export type Logger = winston.Logger;

// ═══════════════════════════════════════════════════════════════════════════════
// LOG COLLECTOR — KEEPS WARN/ERROR LINES OF ONE RUN
// ═══════════════════════════════════════════════════════════════════════════════

export interface CollectedLogEntry {
    level: string;
    message: string;
    timestamp: string;
}

/**
 * In-memory transport. The pipeline attaches what it collected to the
 * critical-failure notification in place of a log file attachment.
 */
export class LogCollector extends Transport {
    private readonly entries: CollectedLogEntry[] = [];
    private readonly maxEntries: number;

    constructor(opts: Transport.TransportStreamOptions & { maxEntries?: number } = {}) {
        super({ level: 'warn', ...opts });
        this.maxEntries = opts.maxEntries ?? 200;
    }

    log(info: { level: string; message: unknown; timestamp?: unknown }, callback: () => void) {
        setImmediate(() => {
            this.emit('logged', info);
        });

        this.entries.push({
            level: info.level,
            message: String(info.message),
            timestamp: typeof info.timestamp === 'string' ? info.timestamp : new Date().toISOString(),
        });
        if (this.entries.length > this.maxEntries) {
            this.entries.shift();
        }

        callback();
    }

    getEntries(): CollectedLogEntry[] {
        return [...this.entries];
    }

    /** One `LEVEL message` line per entry */
    toLines(): string[] {
        return this.entries.map(e => `${e.timestamp} ${e.level.toUpperCase()} ${e.message}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

function consoleTransport(): winston.transport {
    return new winston.transports.Console({
        format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
        ),
    });
}

/**
 * Logger for one pipeline invocation or one fund: console plus
 * `<logDir>/<name>_<date>.log`.
 */
export function createRunLogger(
    name: string,
    date: string,
    logDir: string,
    extra: winston.transport[] = [],
    level: string = LOG_LEVEL
): Logger {
    return winston.createLogger({
        level,
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json()
        ),
        defaultMeta: { run: name, date },
        transports: [
            consoleTransport(),
            new winston.transports.File({ filename: path.join(logDir, `${name}_${date}.log`) }),
            ...extra,
        ],
    });
}

/**
 * Logger that writes nothing. Used where a caller passes no sink.
 */
export function createSilentLogger(): Logger {
    return winston.createLogger({ silent: true });
}

const logger = winston.createLogger({
    level: LOG_LEVEL,
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
    ),
    transports: [consoleTransport()],
});

export default logger;
