import assert from 'node:assert/strict';
import { PDFDict, PDFDocument, PDFName, StandardFonts } from 'pdf-lib';
import { createFontResolver } from '../src/shared/file/content/fonts';
import { readPageContent } from '../src/shared/file/content/page-content';
import { interpretContent } from '../src/shared/file/content/text-layer';
import { extractPdfSpans } from '../src/shared/file/decoders/pdf';
import { createPdfRedactionEngine } from '../src/shared/file/redaction/pdf/engine';
import { UnreadableDocumentError } from '../src/shared/errors';
import { createSilentLogger } from '../src/shared/logger';
import { createCpfLocator } from '../src/shared/pii/detector';

const logger = createSilentLogger();

function approx(actual: number | undefined, expected: number, label: string, tolerance = 1e-6): void {
  assert(actual !== undefined, `${label}: missing value`);
  assert(Math.abs(actual - expected) <= tolerance, `${label}: expected ${expected}, got ${actual}`);
}

async function buildPdf(lines: string[]): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  const courier = await pdf.embedFont(StandardFonts.Courier);
  const page = pdf.addPage([612, 792]);
  lines.forEach((line, index) => {
    page.drawText(line, { x: 50, y: 700 - 20 * index, size: 10, font: courier });
  });
  return pdf.save();
}

async function extractPdfPageTexts(bytes: Uint8Array): Promise<string[]> {
  return (await extractPdfSpans(bytes, logger)).map((page) => page.text);
}

async function contentLayerText(bytes: Uint8Array): Promise<string> {
  const pdf = await PDFDocument.load(bytes);
  const page = pdf.getPage(0);
  const resources = pdf.context.lookupMaybe(page.node.getInheritableAttribute(PDFName.of('Resources')), PDFDict);
  return interpretContent(readPageContent(page, 1), createFontResolver(resources)).text;
}

async function runEndToEndTests(): Promise<void> {
  const input = await buildPdf(['CPF: 123.456.789-00', 'CPF 12345678900 ativo']);
  const engine = createPdfRedactionEngine({ logger });

  assert.equal(engine.getSupport().objectLevelRemoval, true);
  assert.match(engine.getSupport().message, /removed from the text layer/);

  const result = await engine.redactDocument(input, 'sample.pdf');
  assert.equal(result.status, 'redacted');
  assert.equal(result.pageCount, 1);
  assert.equal(result.matchCount, 2);
  assert.equal(result.regionCount, 4);
  assert.equal(result.failedMatchCount, 0);
  assert.equal(result.overlayOnlyCount, 0);
  assert.equal(result.scrubbedGlyphCount, 10);

  const [first, second] = result.plans[0]?.targets ?? [];
  assert.equal(first?.source, 'content');
  approx(first?.runs[0]?.rect.x0, 79, 'punctuated first run x0');
  approx(first?.runs[0]?.rect.x1, 99, 'punctuated first run x1');
  approx(first?.runs[1]?.rect.x0, 151, 'punctuated last run x0');
  approx(first?.runs[1]?.rect.x1, 165, 'punctuated last run x1');
  approx(second?.runs[0]?.rect.x0, 73, 'unpunctuated first run x0');
  approx(second?.runs[0]?.rect.x1, 92, 'unpunctuated first run x1');
  approx(second?.runs[1]?.rect.x0, 128, 'unpunctuated last run x0');
  approx(second?.runs[1]?.rect.x1, 141, 'unpunctuated last run x1');

  assert.equal(await contentLayerText(result.bytes), 'CPF: .456.789-\nCPF 456789  ativo');

  const [extracted = ''] = await extractPdfPageTexts(result.bytes);
  assert.match(extracted, /CPF:\s+\.456\.789-/);
  assert.match(extracted, /CPF\s+456789\s+ativo/);
  assert(!extracted.includes('123.'), 'first three digits must not be extractable');
  assert(!extracted.includes('12345678900'), 'unpunctuated CPF must not be extractable');
  assert.equal(createCpfLocator().findCpfs(extracted).length, 0);
}

async function runDeterminismTests(): Promise<void> {
  const input = await buildPdf(['CPF: 123.456.789-00']);
  const engine = createPdfRedactionEngine({ logger });
  const first = await engine.redactDocument(input);
  const second = await engine.redactDocument(input);

  assert.deepEqual(first.plans, second.plans);
}

async function runUnchangedTests(): Promise<void> {
  const input = await buildPdf(['Conta 123456789012345 encerrada']);
  const result = await createPdfRedactionEngine({ logger }).redactDocument(input);

  assert.equal(result.status, 'unchanged');
  assert.equal(result.matchCount, 0);
  assert.equal(result.bytes, input);
}

async function runOptionTests(): Promise<void> {
  const input = await buildPdf(['CPF: 123.456.789-00']);

  const withPlaceholder = await createPdfRedactionEngine({ logger, options: { placeholder: 'X' } }).redactDocument(input);
  const [placeholderText = ''] = await extractPdfPageTexts(withPlaceholder.bytes);
  assert.equal((placeholderText.match(/X/g) ?? []).length, 5);

  const overlayOnly = createPdfRedactionEngine({ logger, options: { scrubTextLayer: false } });
  assert.equal(overlayOnly.getSupport().objectLevelRemoval, false);
  assert.match(overlayOnly.getSupport().message, /stay in the text layer/);
  const painted = await overlayOnly.redactDocument(input);
  assert.equal(painted.status, 'redacted');
  assert.equal(painted.scrubbedGlyphCount, 0);
  assert.equal(await contentLayerText(painted.bytes), 'CPF: 123.456.789-00');
}

async function runFormXObjectFallbackTests(): Promise<void> {
  const inner = await buildPdf(['CPF 12345678900 ativo']);
  const outer = await PDFDocument.create();
  const [embedded] = await outer.embedPdf(inner);
  assert(embedded, 'Expected an embedded page');
  outer.addPage([612, 792]).drawPage(embedded);

  const result = await createPdfRedactionEngine({ logger }).redactDocument(await outer.save());
  assert.equal(result.status, 'redacted');
  assert.equal(result.overlayOnlyCount, 1);
  assert.equal(result.regionCount, 2);
  assert.equal(result.scrubbedGlyphCount, 0);
  assert.equal(result.plans[0]?.targets[0]?.source, 'spans');
  approx(result.plans[0]?.targets[0]?.runs[0]?.rect.x0, 73, 'fallback first run x0', 0.5);
}

async function runRepeatedCpfAcrossLayersTests(): Promise<void> {
  const inner = await buildPdf(['CPF 12345678900 ativo']);
  const outer = await PDFDocument.create();
  const courier = await outer.embedFont(StandardFonts.Courier);
  const [embedded] = await outer.embedPdf(inner);
  assert(embedded, 'Expected an embedded page');
  const page = outer.addPage([612, 792]);
  page.drawPage(embedded);
  page.drawText('Outro 12345678900 fim', { x: 50, y: 600, size: 10, font: courier });

  const result = await createPdfRedactionEngine({ logger }).redactDocument(await outer.save());
  const targets = result.plans[0]?.targets ?? [];
  assert.deepEqual(targets.map((target) => target.source), ['content', 'spans']);
  assert.equal(result.matchCount, 2);
  assert.equal(result.regionCount, 4);
  assert.equal(result.overlayOnlyCount, 1);
  assert.equal(result.scrubbedGlyphCount, 5);

  approx(targets[0]?.runs[0]?.rect.x0, 85, 'page text first run x0');
  approx(targets[1]?.runs[0]?.rect.x0, 73, 'embedded text first run x0', 0.5);
  assert(Math.abs((targets[1]?.runs[0]?.rect.y0 ?? 0) - 700) < 5, 'embedded text run sits on its own line');
  assert.match(await contentLayerText(result.bytes), /^Outro 456789\s+fim$/);
}

async function runUnreadableTests(): Promise<void> {
  const engine = createPdfRedactionEngine({ logger });
  await assert.rejects(
    engine.redactDocument(new TextEncoder().encode('not a pdf'), 'broken.pdf'),
    (error: unknown) => error instanceof UnreadableDocumentError && error.fileName === 'broken.pdf'
  );
}

async function main(): Promise<void> {
  await runEndToEndTests();
  await runDeterminismTests();
  await runUnchangedTests();
  await runOptionTests();
  await runFormXObjectFallbackTests();
  await runRepeatedCpfAcrossLayersTests();
  await runUnreadableTests();

  console.log('✅ PDF redaction engine tests passed (7 checks).');
}

void main();
