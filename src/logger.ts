export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown> | undefined;

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

export type LogSink = (line: string, level: LogLevel) => void;

const levelOrder: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(raw: string | undefined): LogLevel {
    const v = (raw || 'info').toLowerCase();
    return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' ? v : 'info';
}

let sink: LogSink = (line, level) => { console[level](line); };
let minLevel: LogLevel = 'info';

export function setLogSink(fn: LogSink) { sink = fn; }
export function setLogLevel(level: LogLevel) { minLevel = level; }

const safeStringify = (value: unknown): string | undefined => {
    try { return JSON.stringify(value); } catch { return undefined; }
};

export function formatLine(level: LogLevel, tag: string, message: string, meta: LogMeta, at: Date): string {
    const metaText = meta ? safeStringify(meta) : undefined;
    return `${at.toISOString()} ${level.toUpperCase()} [${tag}] ${message}${metaText ? ' ' + metaText : ''}`;
}

export function createLogger(tag: string): Logger {
    const emit = (level: LogLevel, message: string, meta?: LogMeta) => {
        if (levelOrder[level] < levelOrder[minLevel]) return;
        sink(formatLine(level, tag, message, meta, new Date()), level);
    };
    return {
        debug: (m, meta) => emit('debug', m, meta),
        info: (m, meta) => emit('info', m, meta),
        warn: (m, meta) => emit('warn', m, meta),
        error: (m, meta) => emit('error', m, meta),
    };
}
