/**
 * Structured Logger
 *
 * Leveled, colored logging for the outline converter.
 * Always writes to stderr: stdout carries the session protocol.
 *
 * Usage:
 *   import { createLogger } from './common/logger';
 *
 *   const log = createLogger('session');
 *   log.info('Request received', { input: 'src/main.rs' });
 */

// ============================================================================
// Types
// ============================================================================

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ['pretty', 'json'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export interface LogEntry {
    level: LogLevel;
    scope: string;
    message: string;
    data?: Record<string, unknown>;
    timestamp: string;
}

export interface LoggerConfig {
    /** Minimum level to log (default: 'info') */
    level: LogLevel;
    /** 'pretty' for terminals, 'json' for log collectors (default: 'pretty') */
    format: LogFormat;
    /** Whether to include timestamps (default: true) */
    timestamps: boolean;
    /** Line sink (default: process.stderr) */
    output: (line: string) => void;
}

// ============================================================================
// Log Level Utilities
// ============================================================================

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
    debug: '\x1b[90m',  // gray
    info: '\x1b[36m',   // cyan
    warn: '\x1b[33m',   // yellow
    error: '\x1b[31m',  // red
};

const LEVEL_LABELS: Record<LogLevel, string> = {
    debug: 'DBG',
    info: 'INF',
    warn: 'WRN',
    error: 'ERR',
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

// ============================================================================
// Global Configuration
// ============================================================================

let globalConfig: LoggerConfig = {
    level: 'info',
    format: 'pretty',
    timestamps: true,
    output: (line) => {
        process.stderr.write(line + '\n');
    },
};

/**
 * Configure global logger settings
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
    globalConfig = { ...globalConfig, ...config };
}

// ============================================================================
// Formatting
// ============================================================================

function formatTimestamp(): string {
    const now = new Date();
    const h = now.getHours().toString().padStart(2, '0');
    const m = now.getMinutes().toString().padStart(2, '0');
    const s = now.getSeconds().toString().padStart(2, '0');
    const ms = now.getMilliseconds().toString().padStart(3, '0');
    return `${h}:${m}:${s}.${ms}`;
}

function formatData(data: Record<string, unknown>): string {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(data)) {
        if (value === undefined) continue;
        const strVal = typeof value === 'string' ? value : JSON.stringify(value);
        // Paths and node text can be long
        const display = strVal.length > 80 ? strVal.slice(0, 77) + '...' : strVal;
        parts.push(`${key}=${display}`);
    }
    return parts.join(' ');
}

function formatPretty(entry: LogEntry): string {
    const parts: string[] = [];

    if (globalConfig.timestamps) {
        parts.push(`${DIM}${entry.timestamp}${RESET}`);
    }

    parts.push(`${LEVEL_COLORS[entry.level]}${LEVEL_LABELS[entry.level]}${RESET}`);

    if (entry.scope) {
        parts.push(`${DIM}[${entry.scope}]${RESET}`);
    }

    parts.push(entry.message);

    if (entry.data && Object.keys(entry.data).length > 0) {
        parts.push(`${DIM}${formatData(entry.data)}${RESET}`);
    }

    return parts.join(' ');
}

function formatJson(entry: LogEntry): string {
    return JSON.stringify({
        ts: entry.timestamp,
        level: entry.level,
        scope: entry.scope || undefined,
        msg: entry.message,
        ...entry.data,
    });
}

// ============================================================================
// Logger Class
// ============================================================================

export class Logger {
    constructor(private readonly scope: string) {}

    private shouldLog(level: LogLevel): boolean {
        return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[globalConfig.level];
    }

    private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        if (!this.shouldLog(level)) return;

        const entry: LogEntry = {
            level,
            scope: this.scope,
            message,
            data,
            timestamp: formatTimestamp(),
        };

        globalConfig.output(globalConfig.format === 'json' ? formatJson(entry) : formatPretty(entry));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.log('debug', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.log('info', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.log('warn', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.log('error', message, data);
    }
}

export function createLogger(scope: string): Logger {
    return new Logger(scope);
}
