import { describe, it, expect } from 'vitest';
import { createLogger, formatLogEntry } from '../../src/utils/Logger.js';
import type { LogEntry } from '../../src/utils/Logger.js';

function capture(level: Parameters<typeof createLogger>[0], context?: string) {
  const entries: LogEntry[] = [];
  const logger = createLogger(level, context, (entry) => entries.push(entry));
  return { entries, logger };
}

describe('Logger', () => {
  it('should format entries as single lines', () => {
    const timestamp = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

    expect(formatLogEntry({ level: 'warn', message: 'hello', context: 'ctx', timestamp })).toBe(
      '2024-01-02T03:04:05.000Z WARN  [ctx] hello'
    );
    expect(formatLogEntry({ level: 'error', message: 'hello', timestamp })).toBe('2024-01-02T03:04:05.000Z ERROR hello');
  });

  it('should drop entries below the configured level', () => {
    const { entries, logger } = capture('warn');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
  });

  it('should write nothing when silent', () => {
    const { entries, logger } = capture('silent');

    logger.error('e');

    expect(entries).toEqual([]);
  });

  it('should join child contexts and keep the level', () => {
    const { entries, logger } = capture('info', 'Converter');

    logger.child('Gds').info('written', { elements: 3 });
    logger.child('Gds').debug('hidden');

    expect(entries).toHaveLength(1);
    expect(entries[0].context).toBe('Converter:Gds');
    expect(entries[0].data).toEqual({ elements: 3 });
  });

  it('should use the child name alone without a parent context', () => {
    const { entries, logger } = capture('debug');

    logger.child('Preview').debug('ready');

    expect(entries[0].context).toBe('Preview');
  });
});
