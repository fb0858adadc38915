import assert from 'node:assert/strict';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import { exitCodeFor, listPdfFiles, runBatch, writeFileAtomically } from '../src/batch';
import { runCli } from '../src/cli/program';
import { InputDirectoryMissingError, WriteFailureError } from '../src/shared/errors';
import { createPdfRedactionEngine } from '../src/shared/file/redaction/pdf/engine';
import { createSilentLogger } from '../src/shared/logger';
import { createRecordingLogger } from './recording-logger';

const logger = createSilentLogger();

async function buildPdf(text: string): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  const font = await pdf.embedFont(StandardFonts.Helvetica);
  pdf.addPage([612, 792]).drawText(text, { x: 72, y: 720, size: 12, font });
  return pdf.save();
}

async function seedInput(root: string): Promise<string> {
  const inputDir = path.join(root, 'input');
  await mkdir(inputDir, { recursive: true });
  await writeFile(path.join(inputDir, 'a.pdf'), await buildPdf('CPF: 123.456.789-00'));
  await writeFile(path.join(inputDir, 'b.PDF'), await buildPdf('Sem documento'));
  await writeFile(path.join(inputDir, 'c.pdf'), 'not a pdf');
  await writeFile(path.join(inputDir, 'notes.txt'), 'CPF 12345678900');
  return inputDir;
}

async function runBatchTests(root: string): Promise<void> {
  const inputDir = await seedInput(root);
  const outputDir = path.join(root, 'output', 'nested');

  assert.deepEqual(await listPdfFiles(inputDir), ['a.pdf', 'b.PDF', 'c.pdf']);

  const report = await runBatch({ inputDir, outputDir }, createPdfRedactionEngine({ logger }), logger);
  assert.equal(report.succeeded, 2);
  assert.equal(report.failed, 1);
  assert.deepEqual(
    report.files.map((file) => [file.fileName, file.status]),
    [['a.pdf', 'redacted'], ['b.PDF', 'unchanged'], ['c.pdf', 'failed']]
  );
  assert.match(report.files[2]?.error ?? '', /Cannot open PDF/);
  assert.equal(exitCodeFor(report), 2);

  assert.deepEqual((await readdir(outputDir)).sort(), ['a.pdf', 'b.PDF']);
}

async function runEmptyAndMissingTests(root: string): Promise<void> {
  const emptyDir = path.join(root, 'empty');
  await mkdir(emptyDir);
  const outputDir = path.join(root, 'empty-output');

  const recorder = createRecordingLogger();
  const overlayEngine = createPdfRedactionEngine({ logger, options: { scrubTextLayer: false } });
  const report = await runBatch({ inputDir: emptyDir, outputDir }, overlayEngine, recorder);
  assert.equal(report.files.length, 0);
  assert.deepEqual(
    recorder.entries.map((entry) => entry.message),
    ['Starting PDF processing.', overlayEngine.getSupport().message, 'No PDF files found; nothing to do.']
  );
  assert.equal(exitCodeFor(report), 0);
  assert.deepEqual(await readdir(outputDir), []);

  await assert.rejects(
    runBatch({ inputDir: path.join(root, 'missing'), outputDir }, createPdfRedactionEngine({ logger }), logger),
    (error: unknown) => error instanceof InputDirectoryMissingError
  );
}

async function runAtomicWriteTests(root: string): Promise<void> {
  const missingDir = path.join(root, 'no-such-dir');
  await assert.rejects(
    writeFileAtomically(path.join(missingDir, 'out.pdf'), Uint8Array.of(1, 2, 3)),
    (error: unknown) => error instanceof WriteFailureError && error.outputPath === path.join(missingDir, 'out.pdf')
  );

  const outputDir = path.join(root, 'atomic');
  await mkdir(outputDir);
  await writeFileAtomically(path.join(outputDir, 'out.pdf'), Uint8Array.of(1, 2, 3));
  assert.deepEqual(await readdir(outputDir), ['out.pdf']);
}

async function runCliTests(root: string): Promise<void> {
  const io = { cwd: root, env: {}, createLogger: () => logger };

  assert.equal(await runCli(['--input', 'missing'], io), 1);
  assert.equal(await runCli(['--input', 'input', '--output', 'cli-output', '--fill', '#ff0000', '--margin', '0.5'], io), 2);
  assert.deepEqual((await readdir(path.join(root, 'cli-output'))).sort(), ['a.pdf', 'b.PDF']);

  const fromEnv = { ...io, env: { CPF_REDACT_INPUT_DIR: 'empty', CPF_REDACT_OUTPUT_DIR: 'env-output' } };
  assert.equal(await runCli([], fromEnv), 0);
  assert.deepEqual(await readdir(path.join(root, 'env-output')), []);
}

async function main(): Promise<void> {
  const root = await mkdtemp(path.join(os.tmpdir(), 'cpf-batch-'));
  try {
    await runBatchTests(root);
    await runEmptyAndMissingTests(root);
    await runAtomicWriteTests(root);
    await runCliTests(root);
  } finally {
    await rm(root, { recursive: true, force: true });
  }

  console.log('✅ Batch driver tests passed (4 checks).');
}

void main();
