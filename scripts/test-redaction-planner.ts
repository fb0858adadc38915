import assert from 'node:assert/strict';
import { createSpanTextSource } from '../src/shared/file/decoders/pdf';
import { planRedaction, rectsOverlap, unionRects } from '../src/shared/file/redaction/pdf/planner';
import { GeometryLookupError } from '../src/shared/errors';
import { createCpfLocator } from '../src/shared/pii/detector';
import { PRESERVED_DIGITS, type GlyphRect, type PageTextSource } from '../src/shared/types';

const CHAR_WIDTH = 6;

/** Monospaced line starting at x=50 on baseline 700. */
function monospacedSource(text: string, width = CHAR_WIDTH): PageTextSource {
  return {
    text,
    rectAt(offset) {
      if (offset < 0 || offset >= text.length) {
        return undefined;
      }
      return { x0: 50 + width * offset, y0: 698, x1: 50 + width * (offset + 1), y1: 708 };
    }
  };
}

function firstMatch(text: string) {
  const [match] = createCpfLocator().findCpfs(text);
  assert(match, `Expected a CPF in "${text}"`);
  return match;
}

function preservedRects(source: PageTextSource, text: string): GlyphRect[] {
  const match = firstMatch(text);
  return PRESERVED_DIGITS.flatMap((digitIndex) => {
    const position = match.digitPositions[digitIndex];
    const rect = position ? source.rectAt(position.offset) : undefined;
    return rect ? [rect] : [];
  });
}

function runPunctuatedPlanTests(): void {
  const text = 'CPF: 123.456.789-00';
  const source = monospacedSource(text);
  const runs = planRedaction(firstMatch(text), source, 1);

  assert.equal(runs.length, 2);
  assert.deepEqual(runs[0]?.digitIndices, [0, 1, 2]);
  assert.deepEqual(runs[0]?.rect, { x0: 79, y0: 697, x1: 99, y1: 709 });
  assert.deepEqual(runs[1]?.digitIndices, [9, 10]);
  assert.deepEqual(runs[1]?.rect, { x0: 151, y0: 697, x1: 165, y1: 709 });
  assert.equal(runs[0]?.glyphRects.length, 3);
}

function runAdjacentDigitsClipTests(): void {
  const text = 'CPF 12345678900 ativo';
  const source = monospacedSource(text);
  const runs = planRedaction(firstMatch(text), source, 1);

  // Digit 2 ends where digit 3 starts, so the margin is clipped on that side.
  assert.deepEqual(runs[0]?.rect, { x0: 73, y0: 697, x1: 92, y1: 709 });
  assert.deepEqual(runs[1]?.rect, { x0: 128, y0: 697, x1: 141, y1: 709 });

  for (const run of runs) {
    for (const keep of preservedRects(source, text)) {
      assert.equal(rectsOverlap(run.rect, keep), false, 'mask must not cover preserved digits');
    }
  }
}

function runLargeMarginTests(): void {
  const text = 'x 123.456.789-00';
  const source = monospacedSource(text, 4);
  const runs = planRedaction(firstMatch(text), source, 10);

  for (const run of runs) {
    for (const keep of preservedRects(source, text)) {
      assert.equal(rectsOverlap(run.rect, keep), false, 'large margins are clipped too');
    }
  }
  assert.equal(runs[0]?.rect.x1, 74);
  assert.equal(runs[1]?.rect.x0, 102);
}

function runDeterminismTests(): void {
  const text = 'CPF 12345678900 ativo';
  const first = planRedaction(firstMatch(text), monospacedSource(text), 1);
  const second = planRedaction(firstMatch(text), monospacedSource(text), 1);
  assert.deepEqual(first, second);
}

function runMissingGeometryTests(): void {
  const text = 'CPF 12345678900';
  const source: PageTextSource = {
    text,
    rectAt: (offset) => (offset === 9 ? undefined : monospacedSource(text).rectAt(offset))
  };

  assert.throws(
    () => planRedaction(firstMatch(text), source, 1),
    (error: unknown) => error instanceof GeometryLookupError && error.offset === 9 && !error.message.includes('123')
  );
}

function runSpanInterpolationTests(): void {
  const text = 'CPF 12345678900';
  const source = createSpanTextSource({
    pageNumber: 1,
    text,
    spans: [
      { pageNumber: 1, start: 0, end: 3, text: 'CPF', bbox: { x: 50, y: 700, width: 18, height: 10 } },
      { pageNumber: 1, start: 4, end: 15, text: '12345678900', bbox: { x: 74, y: 700, width: 66, height: 10 } }
    ]
  });

  assert.deepEqual(source.rectAt(4), { x0: 74, y0: 698, x1: 80, y1: 710 });
  assert.deepEqual(source.rectAt(14), { x0: 134, y0: 698, x1: 140, y1: 710 });
  assert.equal(source.rectAt(3), undefined);

  const runs = planRedaction(firstMatch(text), source, 0);
  assert.deepEqual(runs[0]?.rect, { x0: 74, y0: 698, x1: 92, y1: 710 });
  assert.deepEqual(runs[1]?.rect, { x0: 128, y0: 698, x1: 140, y1: 710 });
}

function runGeometryHelperTests(): void {
  assert.deepEqual(
    unionRects([{ x0: 1, y0: 2, x1: 3, y1: 4 }, { x0: 0, y0: 3, x1: 5, y1: 3.5 }]),
    { x0: 0, y0: 2, x1: 5, y1: 4 }
  );
  assert.equal(rectsOverlap({ x0: 0, y0: 0, x1: 2, y1: 2 }, { x0: 2, y0: 0, x1: 4, y1: 2 }), false);
  assert.equal(rectsOverlap({ x0: 0, y0: 0, x1: 2, y1: 2 }, { x0: 1.9, y0: 1, x1: 4, y1: 2 }), true);
}

function main(): void {
  runPunctuatedPlanTests();
  runAdjacentDigitsClipTests();
  runLargeMarginTests();
  runDeterminismTests();
  runMissingGeometryTests();
  runSpanInterpolationTests();
  runGeometryHelperTests();

  console.log('✅ Redaction planner tests passed (7 checks).');
}

main();
