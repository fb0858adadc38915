import assert from 'node:assert/strict';
import { PDFDict, PDFDocument, PDFName, StandardFonts } from 'pdf-lib';
import { createFontResolver, type FontMetrics, type FontResolver } from '../src/shared/file/content/fonts';
import { readPageContent } from '../src/shared/file/content/page-content';
import { interpretContent } from '../src/shared/file/content/text-layer';
import { createRecordingLogger } from './recording-logger';

const encoder = new TextEncoder();

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

function approx(actual: number | undefined, expected: number, label: string): void {
  assert(actual !== undefined, `${label}: missing value`);
  assert(Math.abs(actual - expected) < 1e-6, `${label}: expected ${expected}, got ${actual}`);
}

function runSpacingTests(): void {
  const layer = interpretContent(encoder.encode('BT /F1 10 Tf 2 Tc 50 700 Td (AB) Tj [(C) -1000 (D)] TJ ET'), fonts);

  assert.equal(layer.text, 'ABC D');
  approx(layer.rectAt(0)?.x0, 50, 'A x0');
  approx(layer.rectAt(0)?.x1, 55, 'A x1');
  approx(layer.rectAt(1)?.x0, 57, 'B x0');
  approx(layer.rectAt(2)?.x0, 64, 'C x0');
  assert.equal(layer.rectAt(3), undefined, 'word gap separator has no rectangle');
  approx(layer.rectAt(4)?.x0, 81, 'D x0');
  approx(layer.rectAt(0)?.y0, 698, 'A y0');
  approx(layer.rectAt(0)?.y1, 708, 'A y1');

  const d = layer.glyphAt(4);
  assert.equal(d?.source.operationIndex, 5);
  assert.equal(d?.source.elementIndex, 2);
  approx(d?.source.removalAdjustment, -700, 'D removal adjustment');
}

function runMatrixTests(): void {
  const layer = interpretContent(encoder.encode('q 2 0 0 2 0 0 cm BT /F1 10 Tf 10 20 Td (A) Tj ET Q'), fonts);

  assert.equal(layer.text, 'A');
  assert.deepEqual(layer.rectAt(0), { x0: 20, y0: 36, x1: 30, y1: 56 });
}

function runLineBreakTests(): void {
  const layer = interpretContent(
    encoder.encode('BT /F1 10 Tf 12 TL 50 700 Td (AB) Tj T* (CD) Tj ET BT /F9 10 Tf (ZZ) Tj ET'),
    fonts
  );

  assert.equal(layer.text, 'AB\nCD');
  approx(layer.rectAt(3)?.y0, 686, 'C y0');
  assert.equal(layer.unresolvedFontOperations, 1);
}

async function runStandardFontTests(): Promise<void> {
  const pdf = await PDFDocument.create();
  const courier = await pdf.embedFont(StandardFonts.Courier);
  const page = pdf.addPage([612, 792]);
  page.drawText('CPF 12345678900 ativo', { x: 50, y: 700, size: 10, font: courier });
  page.drawText('Nome: Fulano', { x: 50, y: 680, size: 10, font: courier });

  const reloaded = await PDFDocument.load(await pdf.save());
  const reloadedPage = reloaded.getPage(0);
  const resources = reloaded.context.lookupMaybe(reloadedPage.node.getInheritableAttribute(PDFName.of('Resources')), PDFDict);
  const layer = interpretContent(readPageContent(reloadedPage, 1), createFontResolver(resources));

  assert.equal(layer.text, 'CPF 12345678900 ativo\nNome: Fulano');
  for (let index = 0; index < 21; index += 1) {
    approx(layer.rectAt(index)?.x0, 50 + 6 * index, `glyph ${index} x0`);
    approx(layer.rectAt(index)?.x1, 56 + 6 * index, `glyph ${index} x1`);
  }
  approx(layer.rectAt(22)?.x0, 50, 'second line x0');
}

async function runUnreadableToUnicodeTests(): Promise<void> {
  const pdf = await PDFDocument.create();
  const context = pdf.context;
  const toUnicode = context.register(context.stream('not a cmap', { Filter: 'NotAFilter' }));
  const font = context.obj({ Type: 'Font', Subtype: 'Type1', BaseFont: 'Helvetica', ToUnicode: toUnicode });
  const resources = context.obj({ Font: { F1: font } });

  const logger = createRecordingLogger();
  const resolver = createFontResolver(resources, logger);
  const metrics = resolver.get('F1');
  resolver.get('F1');

  assert(metrics, 'font should still resolve without its CMap');
  assert.equal(metrics.decode(0x41), 'A');
  assert.deepEqual(
    logger.entries.map((entry) => [entry.level, entry.message, entry.context.font]),
    [['warn', 'Ignoring unreadable ToUnicode CMap.', 'Helvetica']]
  );
}

async function main(): Promise<void> {
  runSpacingTests();
  runMatrixTests();
  runLineBreakTests();
  await runStandardFontTests();
  await runUnreadableToUnicodeTests();

  console.log('✅ Content text layer tests passed (5 checks).');
}

void main();
