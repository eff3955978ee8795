import { defaultLogger, err, ok } from '@tessera/types';
import type { Logger, Result } from '@tessera/types';
import type { CallNode, ShortcodeDocument } from './types.js';
import type { FunctionRegistry } from './registry.js';
import { ShortcodeArgs } from './args.js';
import { DirectiveFailedError, UnknownDirectiveError } from './errors.js';
import type { ShortcodeError } from './errors.js';
import { parse } from './parser.js';

const packageLogger = defaultLogger.child('shortcode');

/**
 * Replacement policy for calls that cannot be rendered. Receives the
 * engine error and the offending call and returns the text to splice in;
 * it may rethrow to abort after all.
 */
export type RenderFallback = (error: ShortcodeError, call: CallNode) => string;

/** Options accepted by {@link render} and friends. */
export interface RenderOptions {
  /** Logger for dispatch and fallback events. Defaults to the `shortcode` child of the default logger. */
  logger?: Logger;
  /**
   * When set, unknown directives and handler failures are replaced by the
   * fallback's text instead of aborting the render.
   */
  fallback?: RenderFallback;
}

/** Narrow an unknown thrown value to an evaluator error. */
export function isShortcodeError(value: unknown): value is ShortcodeError {
  return value instanceof UnknownDirectiveError || value instanceof DirectiveFailedError;
}

/**
 * Render a parsed document: text nodes are copied verbatim and each call
 * is replaced by its handler's output, in document order. Handler output is
 * spliced in as-is, with no escaping.
 *
 * @throws {UnknownDirectiveError} When a call names a directive the registry lacks.
 * @throws {DirectiveFailedError} When a handler throws or returns a non-string.
 *
 * @example
 * ```typescript
 * const registry = new Map([['upper', (args: ShortcodeArgs) => args.string('text').toUpperCase()]]);
 * render(parse('{{ upper(text="hi") }}'), registry); // 'HI'
 * ```
 */
export function render(
  document: ShortcodeDocument,
  registry: FunctionRegistry,
  options: RenderOptions = {},
): string {
  const logger = options.logger ?? packageLogger;
  let output = '';
  for (const node of document.nodes) {
    output += node.type === 'text' ? node.value : renderCall(node, registry, options);
  }
  logger.debug('rendered document', { nodes: document.nodes.length, calls: document.calls.length });
  return output;
}

/**
 * Like {@link render}, but reports engine failures as a `Result` instead of
 * throwing. Errors thrown by a fallback that are not engine errors still
 * propagate.
 */
export function tryRender(
  document: ShortcodeDocument,
  registry: FunctionRegistry,
  options: RenderOptions = {},
): Result<string, ShortcodeError> {
  try {
    return ok(render(document, registry, options));
  } catch (error) {
    if (isShortcodeError(error)) {
      return err(error);
    }
    throw error;
  }
}

/** Parse `source` and render it in one step. */
export function renderSource(
  source: string,
  registry: FunctionRegistry,
  options: RenderOptions = {},
): string {
  return render(parse(source), registry, options);
}

/**
 * Render a single call node, applying the fallback policy from `options`.
 */
export function renderCall(
  call: CallNode,
  registry: FunctionRegistry,
  options: RenderOptions = {},
): string {
  const logger = options.logger ?? packageLogger;
  logger.debug('dispatching directive', { directive: call.name, line: call.line, column: call.column });
  try {
    return dispatch(call, registry);
  } catch (error) {
    if (options.fallback === undefined || !isShortcodeError(error)) {
      throw error;
    }
    logger.warn('directive replaced by fallback', {
      directive: call.name,
      code: error.code,
      line: call.line,
      column: call.column,
    });
    return options.fallback(error, call);
  }
}

function dispatch(call: CallNode, registry: FunctionRegistry): string {
  const handler = registry.get(call.name);
  if (handler === undefined) {
    throw new UnknownDirectiveError(call.name, call.line, call.column);
  }

  let output: unknown;
  try {
    output = handler(new ShortcodeArgs(call.args), call);
  } catch (cause) {
    throw new DirectiveFailedError(call.name, call.line, call.column, cause);
  }

  if (typeof output !== 'string') {
    throw new DirectiveFailedError(
      call.name,
      call.line,
      call.column,
      new TypeError(`Handler returned ${output === null ? 'null' : typeof output} instead of a string`),
    );
  }
  return output;
}
