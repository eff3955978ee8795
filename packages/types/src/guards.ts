/**
 * Runtime type guards for values crossing a system boundary
 * (configuration files, embedder-supplied handlers).
 */

// ─── Type Guards ────────────────────────────────────────────────────────────────

/** `true` if `value` is a string with at least one non-whitespace character. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Check whether `value` is a directive or argument identifier:
 * an ASCII letter or underscore followed by letters, digits or underscores.
 */
export function isIdentifier(value: unknown): value is string {
  return typeof value === 'string' && /^[A-Za-z_][A-Za-z0-9_]*$/.test(value);
}

/**
 * Check whether `value` is a plain object (created by `{}`, `Object.create(null)`,
 * or `JSON.parse`), as opposed to an array, class instance or `null`.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check whether `value` is one of `options`.
 *
 * @example
 * ```typescript
 * if (isOneOf(raw, ['throw', 'preserve'] as const)) { ... }
 * ```
 */
export function isOneOf<T extends string>(value: unknown, options: readonly T[]): value is T {
  return typeof value === 'string' && options.some((option) => option === value);
}
