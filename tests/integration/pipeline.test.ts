/**
 * End-to-end rendering across @tessera/types and @tessera/shortcode.
 *
 * Scenario: a site generator renders a Markdown page that embeds figure,
 * note and gallery directives. Calls are lifted out with placeholders, the
 * remaining text goes through a markup pass, and the rendered directives
 * are spliced back in. A second page is rendered under a project
 * configuration file that preserves unknown directives.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

import { formatError, isTesseraError, TesseraErrorCode } from '@tessera/types';
import {
  parse,
  extract,
  renderCalls,
  restore,
  renderSource,
  tryRender,
  ShortcodeRegistry,
  loadConfig,
  renderOptionsFromConfig,
  DEFAULT_PLACEHOLDER,
  CONFIG_FILE_NAME,
} from '@tessera/shortcode';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function siteRegistry(): ShortcodeRegistry {
  return new ShortcodeRegistry()
    .register('figure', (args) => {
      const width = args.optionalInt('width', 640);
      return `<figure><img src="${args.string('src')}" alt="${args.string('alt')}" width="${width}"></figure>`;
    })
    .register('note', (args) => `<span class="note">${args.string('text')}</span>`)
    .register('gallery', (args) => {
      const images = args.array('images').map((image) => `<img src="${String(image)}">`);
      return `<div class="gallery" data-columns="${args.optionalInt('columns', 3)}">${images.join('')}</div>`;
    })
    .freeze();
}

/** A deliberately tiny Markdown pass: headings, emphasis and paragraphs. */
function markup(text: string): string {
  return text
    .split('\n\n')
    .map((block) =>
      block.startsWith('# ')
        ? `<h1>${block.slice(2)}</h1>`
        : `<p>${block.replace(/\*(.+?)\*/g, '<em>$1</em>')}</p>`,
    )
    .join('\n');
}

const PAGE = [
  '# Trip',
  '{{ figure(src="coast.jpg", alt="Coast", width=800) }}',
  'Some *prose* with {{ note(text="careful") }} inline.',
  '{{ gallery(\n  images=["a.jpg", "b.jpg",],\n  columns=2,\n) }}',
  '{{ gallery(images=["c.jpg"], columns=2) }}',
].join('\n\n');

let testDir: string;

beforeEach(async () => {
  testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tessera-pipeline-test-'));
});

afterEach(async () => {
  await fs.rm(testDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Placeholder pipeline
// ---------------------------------------------------------------------------
describe('placeholder pipeline', () => {
  it('renders directives around a markup pass', () => {
    const registry = siteRegistry();
    const document = parse(PAGE);
    // The first gallery has a trailing comma in its argument list, so it stays text.
    expect(document.calls.map((c) => c.name)).toEqual(['figure', 'note', 'gallery']);

    const { text, calls, placeholder } = extract(document);
    expect(text.split(DEFAULT_PLACEHOLDER)).toHaveLength(4);

    const html = restore(markup(text), renderCalls(calls, registry), placeholder);
    expect(html).toBe(
      [
        '<h1>Trip</h1>',
        '<p><figure><img src="coast.jpg" alt="Coast" width="800"></figure></p>',
        '<p>Some <em>prose</em> with <span class="note">careful</span> inline.</p>',
        '<p>{{ gallery(\n  images=["a.jpg", "b.jpg",],\n  columns=2,\n) }}</p>',
        '<p><div class="gallery" data-columns="2"><img src="c.jpg"></div></p>',
      ].join('\n'),
    );
  });

  it('renders straight through when no markup pass is needed', () => {
    expect(renderSource('See {{ note(text="this") }}.', siteRegistry())).toBe(
      'See <span class="note">this</span>.',
    );
  });

  it('reports the failing directive with its position and hint', () => {
    const result = tryRender(parse('# Title\n\n{{ video(id=3) }}'), siteRegistry());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(isTesseraError(result.error)).toBe(true);
      expect(formatError(result.error)).toBe(
        '[TESSERA_E200] Unknown directive "video" at 3:1\nHint: Register a handler named "video" or remove the call',
      );
    }
  });

  it('chains the handler error into the report', () => {
    const result = tryRender(parse('{{ figure(src="x.png") }}'), siteRegistry());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(TesseraErrorCode.DIRECTIVE_FAILED);
      expect(formatError(result.error)).toBe(
        '[TESSERA_E201] Directive "figure" at 1:1 failed: Missing required argument "alt"\nCaused by: Missing required argument "alt"',
      );
    }
  });
});

// ---------------------------------------------------------------------------
// Configuration-driven rendering
// ---------------------------------------------------------------------------
describe('configured rendering', () => {
  it('uses the configured placeholder and error policy', async () => {
    await fs.writeFile(
      path.join(testDir, CONFIG_FILE_NAME),
      JSON.stringify({ placeholder: '%%SC%%', onError: 'preserve', logLevel: 'silent' }),
      'utf-8',
    );
    const pageDir = path.join(testDir, 'content', 'posts');
    await fs.mkdir(pageDir, { recursive: true });

    const config = loadConfig(pageDir);
    expect(config).toEqual({ placeholder: '%%SC%%', onError: 'preserve', logLevel: 'silent' });
    if (config === undefined) return;

    const options = renderOptionsFromConfig(config);
    const { text, calls, placeholder } = extract(
      parse('*{{ note(text="hi") }}* and {{ unknown(x=1) }}'),
      config.placeholder,
    );
    expect(text).toBe('*%%SC%%* and %%SC%%');

    const html = restore(markup(text), renderCalls(calls, siteRegistry(), options), placeholder);
    expect(html).toBe('<p><em><span class="note">hi</span></em> and {{ unknown(x=1) }}</p>');
  });
});
