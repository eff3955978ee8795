import type { Argument, CallNode, Literal, ShortcodeDocument } from './types.js';

/**
 * Format a literal as directive source. Strings keep their delimiter and
 * numbers their original lexeme, so `parseLiteral(formatLiteral(l))`
 * yields `l` again.
 *
 * @example
 * ```typescript
 * formatLiteral({ kind: 'array', items: [{ kind: 'int', value: 1, raw: '1' }] }); // '[1]'
 * ```
 */
export function formatLiteral(literal: Literal): string {
  switch (literal.kind) {
    case 'bool':
      return literal.value ? 'true' : 'false';
    case 'string':
      return `${literal.quote}${literal.value}${literal.quote}`;
    case 'int':
    case 'float':
      return literal.raw;
    case 'array':
      return `[${literal.items.map(formatLiteral).join(', ')}]`;
  }
}

function formatArgument(arg: Argument): string {
  return `${arg.name}=${formatLiteral(arg.value)}`;
}

/** Canonical source for a call: `{{ name(a=1, b="x") }}`. */
export function formatCall(call: Pick<CallNode, 'name' | 'args'>): string {
  return `{{ ${call.name}(${call.args.map(formatArgument).join(', ')}) }}`;
}

/**
 * Serialize a document back to source. Text is emitted verbatim and every
 * call in canonical form, normalizing whitespace inside directives.
 */
export function serialize(document: ShortcodeDocument): string {
  return document.nodes
    .map((node) => (node.type === 'text' ? node.value : formatCall(node)))
    .join('');
}
