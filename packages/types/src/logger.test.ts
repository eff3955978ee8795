import { describe, it, expect, vi } from 'vitest';
import {
  Logger,
  createLogger,
  defaultLogger,
  LogLevel,
  parseLogLevel,
} from './logger.js';
import type { LogEntry, LogOutput } from './logger.js';

// ─── Helpers ────────────────────────────────────────────────────────────────────

/** Create a logger whose output is captured into an array for inspection. */
function captureLogger(
  level: LogLevel = LogLevel.DEBUG,
  component?: string,
): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const output: LogOutput = (entry) => entries.push(entry);
  const logger = new Logger({ level, component, output });
  return { logger, entries };
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe('LogLevel', () => {
  it('levels are ordered from least to most severe', () => {
    expect(LogLevel.DEBUG).toBeLessThan(LogLevel.INFO);
    expect(LogLevel.INFO).toBeLessThan(LogLevel.WARN);
    expect(LogLevel.WARN).toBeLessThan(LogLevel.ERROR);
    expect(LogLevel.ERROR).toBeLessThan(LogLevel.SILENT);
  });
});

describe('parseLogLevel', () => {
  it('maps level names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel('Silent')).toBe(LogLevel.SILENT);
  });

  it('returns undefined for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});

describe('Logger: default creation', () => {
  it('defaults to INFO level', () => {
    expect(new Logger().getLevel()).toBe(LogLevel.INFO);
  });

  it('defaults to console.log JSON output', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new Logger();
    logger.info('hello');
    expect(spy).toHaveBeenCalledOnce();
    const parsed: unknown = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(parsed).toMatchObject({ level: 'INFO', message: 'hello' });
    spy.mockRestore();
  });

  it('createLogger and defaultLogger produce Logger instances', () => {
    expect(createLogger()).toBeInstanceOf(Logger);
    expect(defaultLogger).toBeInstanceOf(Logger);
    expect(defaultLogger.getLevel()).toBe(LogLevel.INFO);
  });
});

describe('Logger: level filtering', () => {
  it('emits entries at or above the threshold', () => {
    const { logger, entries } = captureLogger(LogLevel.WARN);
    logger.debug('no');
    logger.info('no');
    logger.warn('yes');
    logger.error('yes');
    expect(entries.map((e) => e.level)).toEqual(['WARN', 'ERROR']);
  });

  it('SILENT suppresses all output', () => {
    const { logger, entries } = captureLogger(LogLevel.SILENT);
    logger.debug('no');
    logger.info('no');
    logger.warn('no');
    logger.error('no');
    expect(entries).toHaveLength(0);
  });

  it('setLevel changes filtering at runtime', () => {
    const { logger, entries } = captureLogger(LogLevel.ERROR);
    logger.info('dropped');
    logger.setLevel(LogLevel.DEBUG);
    logger.info('kept');
    expect(entries.map((e) => e.message)).toEqual(['kept']);
  });

  it('isEnabled reports whether a level would be emitted', () => {
    const { logger } = captureLogger(LogLevel.INFO);
    expect(logger.isEnabled(LogLevel.DEBUG)).toBe(false);
    expect(logger.isEnabled(LogLevel.INFO)).toBe(true);
    expect(logger.isEnabled(LogLevel.SILENT)).toBe(false);
  });
});

describe('Logger: entries', () => {
  it('includes contextual fields and an ISO timestamp', () => {
    const { logger, entries } = captureLogger();
    logger.info('parsed', { nodes: 3 });
    expect(entries[0]?.nodes).toBe(3);
    expect(entries[0]?.message).toBe('parsed');
    expect(new Date(String(entries[0]?.timestamp)).toISOString()).toBe(entries[0]?.timestamp);
  });

  it('omits component when none is set', () => {
    const { logger, entries } = captureLogger();
    logger.info('x');
    expect(entries[0]).not.toHaveProperty('component');
  });
});

describe('Logger: child loggers', () => {
  it('child without a parent component uses the child name', () => {
    const { logger, entries } = captureLogger();
    logger.child('shortcode').info('x');
    expect(entries[0]?.component).toBe('shortcode');
  });

  it('child extends the parent component with a dot', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG, 'site');
    logger.child('shortcode').child('render').warn('x');
    expect(entries[0]?.component).toBe('site.shortcode.render');
  });

  it('child inherits level and output but changes independently', () => {
    const { logger, entries } = captureLogger(LogLevel.WARN);
    const child = logger.child('c');
    expect(child.getLevel()).toBe(LogLevel.WARN);
    child.setLevel(LogLevel.DEBUG);
    child.debug('child');
    logger.debug('parent');
    expect(entries.map((e) => e.message)).toEqual(['child']);
  });
});
