import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { isDebugEnabled, createDebugLogger } from './debug.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Save and restore the original DEBUG env var around each test. */
let originalDebug: string | undefined;

beforeEach(() => {
  originalDebug = process.env.DEBUG;
});

afterEach(() => {
  if (originalDebug === undefined) {
    delete process.env.DEBUG;
  } else {
    process.env.DEBUG = originalDebug;
  }
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// isDebugEnabled
// ---------------------------------------------------------------------------
describe('isDebugEnabled', () => {
  it('returns false when DEBUG is not set or empty', () => {
    delete process.env.DEBUG;
    expect(isDebugEnabled()).toBe(false);
    process.env.DEBUG = '';
    expect(isDebugEnabled('tessera:shortcode')).toBe(false);
  });

  it('DEBUG=tessera enables every tessera namespace', () => {
    process.env.DEBUG = 'tessera';
    expect(isDebugEnabled()).toBe(true);
    expect(isDebugEnabled('tessera:shortcode')).toBe(true);
    expect(isDebugEnabled('other:thing')).toBe(false);
  });

  it('DEBUG=tessera:* enables every tessera namespace', () => {
    process.env.DEBUG = 'tessera:*';
    expect(isDebugEnabled('tessera')).toBe(true);
    expect(isDebugEnabled('tessera:config')).toBe(true);
  });

  it('DEBUG=* enables everything', () => {
    process.env.DEBUG = '*';
    expect(isDebugEnabled('anything')).toBe(true);
  });

  it('an exact namespace enables only that namespace', () => {
    process.env.DEBUG = 'tessera:shortcode';
    expect(isDebugEnabled('tessera:shortcode')).toBe(true);
    expect(isDebugEnabled('tessera:config')).toBe(false);
  });

  it('supports comma-separated patterns and prefix wildcards', () => {
    process.env.DEBUG = 'site:build, tessera:shortcode:*';
    expect(isDebugEnabled('site:build')).toBe(true);
    expect(isDebugEnabled('tessera:shortcode')).toBe(true);
    expect(isDebugEnabled('tessera:shortcode:parse')).toBe(true);
    expect(isDebugEnabled('tessera:config')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// createDebugLogger
// ---------------------------------------------------------------------------
describe('createDebugLogger', () => {
  it('is a no-op when the namespace is disabled', () => {
    delete process.env.DEBUG;
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const dbg = createDebugLogger('tessera:shortcode');
    dbg.log('hidden');
    dbg.time('parse')();
    expect(spy).not.toHaveBeenCalled();
  });

  it('prefixes output with the namespace when enabled', () => {
    process.env.DEBUG = 'tessera:shortcode';
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const dbg = createDebugLogger('tessera:shortcode');
    dbg.log('parsed', 3);
    expect(spy).toHaveBeenCalledOnce();
    expect(spy.mock.calls[0]?.slice(1)).toEqual(['[tessera:shortcode]', 'parsed', 3]);
  });

  it('warn writes to console.warn with a WARN marker', () => {
    process.env.DEBUG = 'tessera';
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createDebugLogger('tessera:config').warn('odd value');
    expect(spy.mock.calls[0]?.slice(1)).toEqual(['[tessera:config]', 'WARN', 'odd value']);
  });

  it('time logs the elapsed milliseconds under the label', () => {
    process.env.DEBUG = 'tessera';
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const stop = createDebugLogger('tessera:shortcode').time('parse');
    stop();
    expect(String(spy.mock.calls[0]?.[2])).toMatch(/^parse: \d+\.\d{2}ms$/);
  });
});
