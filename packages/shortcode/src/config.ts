/**
 * `tessera.config.json` support.
 *
 * Reads the renderer's policy settings from the nearest configuration file
 * above a directory. Uses only Node built-in `fs` and `path`.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import {
  LogLevel,
  TesseraErrorCode,
  defaultLogger,
  isNonEmptyString,
  isOneOf,
  isPlainObject,
  parseLogLevel,
} from '@tessera/types';
import type { Logger } from '@tessera/types';
import { ConfigError } from './errors.js';
import type { RenderOptions } from './evaluator.js';

// ─── Types ────────────────────────────────────────────────────────────────────

/** What to do with a call that names an unknown directive or whose handler fails. */
export type ErrorPolicy = 'throw' | 'preserve' | 'empty';

const ERROR_POLICIES: readonly ErrorPolicy[] = ['throw', 'preserve', 'empty'];

const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

/** Shape of a `tessera.config.json` file. */
export interface TesseraConfig {
  /** Placeholder token used by `extract` / `restore`. */
  placeholder?: string;
  /**
   * `throw` aborts the render (default), `preserve` leaves the directive's
   * source text in the output, `empty` removes it.
   */
  onError?: ErrorPolicy;
  /** Minimum level for the renderer's logger. */
  logLevel?: (typeof LOG_LEVEL_NAMES)[number];
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'tessera.config.json';

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Search for `tessera.config.json` starting at `cwd` and walking up to the
 * filesystem root. Returns the absolute path, or `undefined`.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) break;
    dir = parent;
  }

  return undefined;
}

/**
 * Load and validate the nearest `tessera.config.json`.
 * Returns `undefined` when there is none.
 *
 * @throws {ConfigError} When the file cannot be parsed or a field is invalid.
 */
export function loadConfig(cwd?: string): TesseraConfig | undefined {
  const filePath = findConfigFile(cwd);
  if (!filePath) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (cause) {
    throw new ConfigError(
      TesseraErrorCode.CONFIG_UNREADABLE,
      filePath,
      `cannot read configuration: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause,
    );
  }
  return validateConfig(parsed, filePath);
}

/**
 * Check that `value` has the shape of a {@link TesseraConfig}.
 * Unknown keys are rejected so typos do not go unnoticed.
 *
 * @param source - Where the value came from, used in error messages.
 */
export function validateConfig(value: unknown, source = CONFIG_FILE_NAME): TesseraConfig {
  if (!isPlainObject(value)) {
    throw new ConfigError(TesseraErrorCode.CONFIG_INVALID, source, 'configuration must be a JSON object');
  }

  const config: TesseraConfig = {};
  for (const [key, field] of Object.entries(value)) {
    switch (key) {
      case 'placeholder':
        if (!isNonEmptyString(field)) {
          throw invalid(source, key, 'must be a non-empty string');
        }
        config.placeholder = field;
        break;
      case 'onError':
        if (!isOneOf(field, ERROR_POLICIES)) {
          throw invalid(source, key, `must be one of: ${ERROR_POLICIES.join(', ')}`);
        }
        config.onError = field;
        break;
      case 'logLevel':
        if (!isOneOf(field, LOG_LEVEL_NAMES)) {
          throw invalid(source, key, `must be one of: ${LOG_LEVEL_NAMES.join(', ')}`);
        }
        config.logLevel = field;
        break;
      default:
        throw invalid(source, key, 'is not a recognized setting');
    }
  }
  return config;
}

/**
 * Translate a configuration into {@link RenderOptions}.
 *
 * @param logger - Base logger; its `shortcode` child receives the
 *   configured level. Defaults to the package's default logger.
 */
export function renderOptionsFromConfig(config: TesseraConfig, logger: Logger = defaultLogger): RenderOptions {
  const child = logger.child('shortcode');
  if (config.logLevel !== undefined) {
    child.setLevel(parseLogLevel(config.logLevel) ?? LogLevel.INFO);
  }

  const policy: ErrorPolicy = config.onError ?? 'throw';
  switch (policy) {
    case 'throw':
      return { logger: child };
    case 'preserve':
      return { logger: child, fallback: (_error, call) => call.raw };
    case 'empty':
      return { logger: child, fallback: () => '' };
  }
}

function invalid(source: string, key: string, message: string): ConfigError {
  return new ConfigError(TesseraErrorCode.CONFIG_INVALID, source, `"${key}" ${message}`);
}
