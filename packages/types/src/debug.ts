/**
 * Namespaced debug output controlled by the `DEBUG` environment variable.
 *
 * Accepted patterns (comma-separated): `*`, `tessera`, `tessera:*`,
 * an exact namespace such as `tessera:shortcode`, or a prefix wildcard
 * such as `tessera:shortcode:*`.
 *
 * @packageDocumentation
 */

// ─── Debug detection ────────────────────────────────────────────────────────────

/**
 * Check whether debug output is enabled for `namespace`. Without a
 * namespace, reports whether any Tessera debug output is enabled.
 */
export function isDebugEnabled(namespace?: string): boolean {
  const debugEnv = (typeof process !== 'undefined' && process.env?.DEBUG) || '';
  if (!debugEnv) {
    return false;
  }

  const patterns = debugEnv.split(',').map((p) => p.trim()).filter(Boolean);

  for (const pattern of patterns) {
    if (pattern === '*') {
      return true;
    }

    if (pattern === 'tessera' || pattern === 'tessera:*') {
      if (!namespace || namespace === 'tessera' || namespace.startsWith('tessera:')) {
        return true;
      }
    }

    if (namespace && pattern === namespace) {
      return true;
    }

    if (namespace && pattern.endsWith(':*')) {
      const prefix = pattern.slice(0, -2);
      if (namespace === prefix || namespace.startsWith(prefix + ':')) {
        return true;
      }
    }
  }

  return false;
}

// ─── Debug logger ───────────────────────────────────────────────────────────────

/** The shape of a debug logger returned by {@link createDebugLogger}. */
export interface DebugLogger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  /** Start a timer. The returned function logs the elapsed milliseconds. */
  time: (label: string) => () => void;
}

const noop = (): void => {};

const noopTimer = (): (() => void) => noop;

/**
 * Create a debug logger for `namespace`. The `DEBUG` variable is read once,
 * here; when it does not enable the namespace every method is a no-op.
 *
 * @example
 * ```typescript
 * const dbg = createDebugLogger('tessera:shortcode');
 * const stop = dbg.time('parse');
 * parse(source);
 * stop(); // [tessera:shortcode] parse: 0.42ms
 * ```
 */
export function createDebugLogger(namespace: string): DebugLogger {
  if (!isDebugEnabled(namespace)) {
    return {
      log: noop,
      warn: noop,
      time: noopTimer,
    };
  }

  const prefix = `[${namespace}]`;

  return {
    log: (...args: unknown[]): void => {
      console.log(new Date().toISOString(), prefix, ...args);
    },
    warn: (...args: unknown[]): void => {
      console.warn(new Date().toISOString(), prefix, 'WARN', ...args);
    },
    time: (label: string): (() => void) => {
      const start = performance.now();
      return (): void => {
        const elapsed = performance.now() - start;
        console.log(new Date().toISOString(), prefix, `${label}: ${elapsed.toFixed(2)}ms`);
      };
    },
  };
}
