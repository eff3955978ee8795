/**
 * @tessera/shortcode -- shortcode parser and renderer for content documents.
 *
 * Authors write prose interleaved with `{{ name(arg=value, ...) }}`
 * directives. Parsing never fails: anything that is not a complete,
 * well-formed directive stays in the document as text. Rendering replaces
 * each directive with the output of a handler looked up by name.
 *
 * @packageDocumentation
 */

export type {
  QuoteChar,
  Span,
  BoolLiteral,
  StringLiteral,
  IntLiteral,
  FloatLiteral,
  ArrayLiteral,
  Literal,
  LiteralKind,
  LiteralValue,
  LiteralFailure,
  LiteralFailureKind,
  Argument,
  TextNode,
  CallNode,
  Node,
  ShortcodeDocument,
} from './types.js';

export { parse, reconstruct, isTextNode, isCallNode } from './parser.js';
export { parseLiteral, literalToValue, MAX_ARRAY_DEPTH } from './literal.js';
export { ShortcodeArgs } from './args.js';
export { ShortcodeRegistry } from './registry.js';
export type { ShortcodeHandler, FunctionRegistry } from './registry.js';
export {
  render,
  tryRender,
  renderSource,
  renderCall,
  isShortcodeError,
} from './evaluator.js';
export type { RenderOptions, RenderFallback } from './evaluator.js';
export { extract, renderCalls, restore, DEFAULT_PLACEHOLDER } from './placeholder.js';
export type { ExtractedDocument, PlaceholderCall } from './placeholder.js';
export { formatLiteral, formatCall, serialize } from './serialize.js';
export {
  findConfigFile,
  loadConfig,
  validateConfig,
  renderOptionsFromConfig,
  CONFIG_FILE_NAME,
} from './config.js';
export type { TesseraConfig, ErrorPolicy } from './config.js';
export {
  UnknownDirectiveError,
  DirectiveFailedError,
  RegistryError,
  ArgumentError,
  PlaceholderError,
  ConfigError,
} from './errors.js';
export type { ShortcodeError } from './errors.js';
