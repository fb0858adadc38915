import assert from 'node:assert/strict';
import type { FontMetrics, FontResolver } from '../src/shared/file/content/fonts';
import { formatNumber, scrubGlyphs } from '../src/shared/file/content/scrub';
import { interpretContent, type ContentTextLayer } from '../src/shared/file/content/text-layer';
import { createCpfLocator } from '../src/shared/pii/detector';
import { MASKED_DIGIT_RUNS } from '../src/shared/types';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const fixedWidthFont: FontMetrics = {
  baseFont: 'TestMono',
  bytesPerCode: 1,
  ascent: 800,
  descent: -200,
  decode: (code) => (code >= 0x20 ? String.fromCharCode(code) : undefined),
  widthOf: () => 500
};

const fonts: FontResolver = {
  get: (name) => (name === 'F1' ? fixedWidthFont : undefined)
};

function maskedGlyphIndices(layer: ContentTextLayer): number[] {
  const indices: number[] = [];
  for (const match of createCpfLocator().findCpfs(layer.text)) {
    for (const digitIndex of MASKED_DIGIT_RUNS.flat()) {
      const position = match.digitPositions[digitIndex];
      const glyph = position ? layer.glyphAt(position.offset) : undefined;
      if (glyph) {
        indices.push(layer.glyphs.indexOf(glyph));
      }
    }
  }
  return indices;
}

function scrub(source: string): string {
  const layer = interpretContent(encoder.encode(source), fonts);
  return decoder.decode(scrubGlyphs(layer, maskedGlyphIndices(layer)));
}

function runTjTests(): void {
  const output = scrub('BT /F1 10 Tf 2 Tc 50 700 Td (CPF 12345678900) Tj ET');
  assert.equal(output, 'BT /F1 10 Tf 2 Tc 50 700 Td [<43504620> -2100 <343536373839> -1400] TJ ET');

  const rescanned = interpretContent(encoder.encode(output), fonts);
  assert.equal(rescanned.text, 'CPF 456789');
  assert.equal(rescanned.rectAt(4)?.x0, 99, 'kept digits stay in place');
  assert.equal(createCpfLocator().findCpfs(rescanned.text).length, 0);
}

function runTjArrayAndQuoteTests(): void {
  const output = scrub("BT /F1 10 Tf 12 TL 50 700 Td [(12) -100 (3.456.789-00)] TJ (123.456.789-00) ' ET");
  assert.equal(
    output,
    'BT /F1 10 Tf 12 TL 50 700 Td [-1600 <2E3435362E3738392D> -1000] TJ T* [-1500 <2E3435362E3738392D> -1000] TJ ET'
  );

  const rescanned = interpretContent(encoder.encode(output), fonts);
  assert.equal(rescanned.text, '.456.789-\n.456.789-');
}

function runDoubleQuoteTests(): void {
  const output = scrub('BT /F1 10 Tf 50 700 Td 3 1 (12345678900) " ET');
  assert.equal(output, 'BT /F1 10 Tf 50 700 Td 3 Tw 1 Tc T* [-1800 <343536373839> -1200] TJ ET');
}

function runUntouchedTests(): void {
  const source = 'BT /F1 10 Tf 50 700 Td (no identifiers here) Tj ET';
  const layer = interpretContent(encoder.encode(source), fonts);
  assert.equal(decoder.decode(scrubGlyphs(layer, [])), source);

  assert.equal(formatNumber(-1234.56789), '-1234.568');
  assert.equal(formatNumber(-0.0001), '0');
  assert.equal(formatNumber(-600), '-600');
}

function main(): void {
  runTjTests();
  runTjArrayAndQuoteTests();
  runDoubleQuoteTests();
  runUntouchedTests();

  console.log('✅ Content scrub tests passed (4 checks).');
}

main();
