import { describe, expect, it } from 'vitest';
import { createLogger, formatLogLine, parseLogLevel } from '../server/logger';
import type { LogLevel } from '../server/logger';

function collect(level: LogLevel) {
  const entries: Array<{ level: LogLevel; line: string; details?: unknown }> = [];
  const log = createLogger({ level, sink: (entryLevel, line, details) => entries.push({ level: entryLevel, line, details }) });
  return { log, entries };
}

describe('formatLogLine', () => {
  it('prefixes the timestamp, padded level and scope', () => {
    const now = new Date('2024-05-01T10:20:30.000Z');

    expect(formatLogLine('info', 'job', 'Started', now)).toBe('2024-05-01T10:20:30.000Z INFO  [job] Started');
    expect(formatLogLine('error', null, 'Boom', now)).toBe('2024-05-01T10:20:30.000Z ERROR Boom');
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively and defaults to info', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
    expect(parseLogLevel('warn')).toBe('warn');
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});

describe('createLogger', () => {
  it('drops messages below the threshold', () => {
    const { log, entries } = collect('warn');

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown too', { code: 1 });

    expect(entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
    expect(entries[1]?.details).toEqual({ code: 1 });
  });

  it('nests child scopes', () => {
    const { log, entries } = collect('debug');

    log.child('backend').child('local').info('ready');

    expect(entries[0]?.line).toMatch(/ INFO  \[backend:local\] ready$/);
  });
});
