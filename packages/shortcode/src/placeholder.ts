import { TesseraError, TesseraErrorCode, createDebugLogger, isNonEmptyString } from '@tessera/types';
import type { CallNode, ShortcodeDocument, Span } from './types.js';
import type { FunctionRegistry } from './registry.js';
import { renderCall } from './evaluator.js';
import type { RenderOptions } from './evaluator.js';
import { PlaceholderError } from './errors.js';

/** Token that stands in for each call while the text is processed elsewhere. */
export const DEFAULT_PLACEHOLDER = '@@TESSERA_SHORTCODE@@';

/** Derived tokens tried when the document text already contains the placeholder. */
const MAX_TOKEN_ATTEMPTS = 1000;

const dbg = createDebugLogger('tessera:shortcode');

/** A call lifted out of the text, with the span its placeholder occupies. */
export interface PlaceholderCall {
  call: CallNode;
  span: Span;
}

/** Text with placeholders, plus the calls they replaced, in order. */
export interface ExtractedDocument {
  text: string;
  calls: PlaceholderCall[];
  placeholder: string;
}

/**
 * Replace every call with `placeholder` so the remaining text can go through
 * another processor (typically Markdown) before the calls are rendered and
 * spliced back with {@link restore}.
 *
 * When the document text itself contains the token, a numbered variant
 * (`@@TESSERA_SHORTCODE@@1`, ...) is used instead. Always pass the returned
 * `placeholder` on to `restore`.
 *
 * @example
 * ```typescript
 * const { text, calls } = extract(parse('a {{ b() }} c'));
 * // text === 'a @@TESSERA_SHORTCODE@@ c', calls[0].span === { start: 2, end: 23 }
 * ```
 */
export function extract(
  document: ShortcodeDocument,
  placeholder: string = DEFAULT_PLACEHOLDER,
): ExtractedDocument {
  assertPlaceholder(placeholder);
  for (let attempt = 0; attempt <= MAX_TOKEN_ATTEMPTS; attempt++) {
    const token = attempt === 0 ? placeholder : `${placeholder}${attempt}`;
    const extracted = substitute(document, token);
    if (occursOnlyAtCalls(extracted)) {
      if (attempt > 0) {
        dbg.warn(`document text contains "${placeholder}"; using "${token}"`);
      }
      return extracted;
    }
  }
  throw new TesseraError(
    TesseraErrorCode.INVALID_INPUT,
    `No placeholder derived from "${placeholder}" is absent from the document text`,
  );
}

function substitute(document: ShortcodeDocument, placeholder: string): ExtractedDocument {
  let text = '';
  const calls: PlaceholderCall[] = [];
  for (const node of document.nodes) {
    if (node.type === 'text') {
      text += node.value;
      continue;
    }
    const start = text.length;
    text += placeholder;
    calls.push({ call: node, span: { start, end: text.length } });
  }
  return { text, calls, placeholder };
}

/** Whether a left-to-right scan for the token finds exactly the substituted spans. */
function occursOnlyAtCalls({ text, calls, placeholder }: ExtractedDocument): boolean {
  let from = 0;
  for (const { span } of calls) {
    if (text.indexOf(placeholder, from) !== span.start) {
      return false;
    }
    from = span.end;
  }
  return text.indexOf(placeholder, from) === -1;
}

/** Render extracted calls in order, with the same semantics as `render`. */
export function renderCalls(
  calls: readonly PlaceholderCall[],
  registry: FunctionRegistry,
  options: RenderOptions = {},
): string[] {
  return calls.map(({ call }) => renderCall(call, registry, options));
}

/**
 * Replace the placeholders in `text`, in order, with `rendered`.
 *
 * @throws {PlaceholderError} When the number of placeholders in `text`
 *   differs from `rendered.length`.
 */
export function restore(
  text: string,
  rendered: readonly string[],
  placeholder: string = DEFAULT_PLACEHOLDER,
): string {
  assertPlaceholder(placeholder);
  const pieces = text.split(placeholder);
  const found = pieces.length - 1;
  if (found !== rendered.length) {
    throw new PlaceholderError(rendered.length, found);
  }

  let out = pieces[0] ?? '';
  for (let i = 0; i < rendered.length; i++) {
    out += `${rendered[i] ?? ''}${pieces[i + 1] ?? ''}`;
  }
  return out;
}

function assertPlaceholder(placeholder: string): void {
  if (!isNonEmptyString(placeholder)) {
    throw new TesseraError(
      TesseraErrorCode.INVALID_INPUT,
      'Placeholder must be a non-empty string',
    );
  }
}
