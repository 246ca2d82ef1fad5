import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, formatLine, parseLogLevel, setLogLevel, setLogSink } from '../logger';

describe('logger', () => {
    afterEach(() => { setLogLevel('info'); setLogSink(() => { }); });

    it('formats level, tag, message and meta', () => {
        const at = new Date('2026-01-02T03:04:05.000Z');
        expect(formatLine('warn', 'highscores', 'Could not save', { file: 'a.json' }, at))
            .toBe('2026-01-02T03:04:05.000Z WARN [highscores] Could not save {"file":"a.json"}');
        expect(formatLine('info', 'main', 'Starting', undefined, at)).toBe('2026-01-02T03:04:05.000Z INFO [main] Starting');
    });

    it('drops meta that cannot be serialized', () => {
        const loop: Record<string, unknown> = {};
        loop.self = loop;
        expect(formatLine('error', 'x', 'boom', loop, new Date(0))).toBe('1970-01-01T00:00:00.000Z ERROR [x] boom');
    });

    it('filters below the configured level', () => {
        const lines: string[] = [];
        setLogSink(l => lines.push(l));
        setLogLevel('warn');
        const log = createLogger('test');
        log.info('hidden');
        log.warn('shown');
        log.error('also shown');
        expect(lines).toHaveLength(2);
        expect(lines[0]).toMatch(/ WARN \[test\] shown$/);
    });

    it('hands the level to the sink', () => {
        const levels: string[] = [];
        setLogSink((_line, level) => levels.push(level));
        setLogLevel('debug');
        const log = createLogger('test');
        log.debug('a');
        log.error('b');
        expect(levels).toEqual(['debug', 'error']);
    });

    it('parses log levels leniently', () => {
        expect(parseLogLevel('DEBUG')).toBe('debug');
        expect(parseLogLevel(undefined)).toBe('info');
        expect(parseLogLevel('loud')).toBe('info');
    });
});
