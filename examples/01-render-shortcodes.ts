/**
 * Example 01: Rendering Shortcodes
 *
 * Walks through the shortcode engine end to end:
 * - Parsing a page into text runs and directive calls
 * - Registering handlers that read typed arguments
 * - Rendering, with and without a fallback for unknown directives
 * - Lifting calls out with placeholders around a Markdown pass
 *
 * Run: npx tsx examples/01-render-shortcodes.ts
 */

import {
  parse,
  render,
  tryRender,
  extract,
  renderCalls,
  restore,
  serialize,
  ShortcodeRegistry,
} from '@tessera/shortcode';
import { formatError, LogLevel, Logger } from '@tessera/types';

const PAGE = `# Release notes

{{ callout(kind="info", text="Version 2 is out") }}

The new dashboard looks like this:

{{ figure(src="dashboard.png", alt="Dashboard", width=960) }}

{{ changelog(items=["faster builds", "dark mode",]) }}

Literal braces like {{ this }} are left alone.
`;

function main() {
  console.log('========================================');
  console.log('  Example 01: Rendering Shortcodes');
  console.log('========================================\n');

  // ── Step 1: Parse ─────────────────────────────────────────────────────────
  // Parsing never fails; malformed directives simply stay text.

  console.log('--- Step 1: Parse ---\n');

  const doc = parse(PAGE);
  for (const call of doc.calls) {
    console.log(`  ${call.line}:${call.column}  ${call.name}(${call.args.map((a) => a.name).join(', ')})`);
  }
  console.log(`  ${doc.nodes.length} nodes, ${doc.calls.length} calls\n`);

  // ── Step 2: Register handlers ─────────────────────────────────────────────

  console.log('--- Step 2: Register handlers ---\n');

  const registry = new ShortcodeRegistry()
    .register('callout', (args) =>
      `<aside class="${args.optionalString('kind', 'note')}">${args.string('text')}</aside>`)
    .register('figure', (args) =>
      `<img src="${args.string('src')}" alt="${args.string('alt')}" width="${args.optionalInt('width', 640)}">`)
    .freeze();

  console.log('  Registered:', registry.names().join(', '), '\n');

  // ── Step 3: Render ────────────────────────────────────────────────────────
  // `changelog` has no handler yet, so a strict render fails.

  console.log('--- Step 3: Render ---\n');

  const strict = tryRender(doc, registry);
  if (!strict.ok) {
    console.log(formatError(strict.error), '\n');
  }

  const lenient = render(doc, registry, {
    logger: new Logger({ level: LogLevel.WARN }),
    fallback: (_error, call) => `<!-- ${call.name} -->`,
  });
  console.log(lenient);

  // ── Step 4: Placeholders ──────────────────────────────────────────────────
  // Calls are lifted out so a Markdown processor never sees handler output.

  console.log('--- Step 4: Placeholders ---\n');

  const { text, calls, placeholder } = extract(doc);
  const markdown = text.replace(/^# (.*)$/m, '<h1>$1</h1>');
  const rendered = renderCalls(calls, registry, { fallback: () => '' });
  console.log(restore(markdown, rendered, placeholder));

  // ── Step 5: Canonical form ────────────────────────────────────────────────

  console.log('--- Step 5: Canonical form ---\n');
  console.log(serialize(parse('{{callout( kind = "tip" ,text=`Spaces are normalized` )}}')));
}

main();
