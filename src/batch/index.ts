import { mkdir, readdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { BatchOptions } from '../shared/config';
import {
  describeError,
  InputDirectoryMissingError,
  UnreadableDocumentError,
  WriteFailureError
} from '../shared/errors';
import type { Logger } from '../shared/logger';
import type { PdfRedactionEngine, PdfRedactionResult } from '../shared/file/redaction/pdf/types';

export type BatchFileStatus = 'redacted' | 'unchanged' | 'failed';

export interface BatchFileResult {
  fileName: string;
  status: BatchFileStatus;
  outputPath?: string;
  matchCount: number;
  regionCount: number;
  failedMatchCount: number;
  overlayOnlyCount: number;
  error?: string;
}

export interface BatchReport {
  inputDir: string;
  outputDir: string;
  files: BatchFileResult[];
  succeeded: number;
  failed: number;
}

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL_FAILURE = 2;

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/** PDF files directly inside `inputDir`, in name order. */
export async function listPdfFiles(inputDir: string): Promise<string[]> {
  if (!(await isDirectory(inputDir))) {
    throw new InputDirectoryMissingError(inputDir);
  }

  const entries = await readdir(inputDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
    .map((entry) => entry.name)
    .sort((left, right) => (left < right ? -1 : left > right ? 1 : 0));
}

/**
 * Writes next to the target and renames over it, so a failed write never
 * leaves a partial file under the output name.
 */
export async function writeFileAtomically(outputPath: string, bytes: Uint8Array): Promise<void> {
  const tempPath = path.join(path.dirname(outputPath), `.${path.basename(outputPath)}.${process.pid}.tmp`);

  try {
    await writeFile(tempPath, bytes);
    await rename(tempPath, outputPath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (!(cleanupError instanceof Error && 'code' in cleanupError && cleanupError.code === 'ENOENT')) {
        throw new WriteFailureError(
          `Could not write ${outputPath} (${describeError(error)}) nor remove ${tempPath} (${describeError(cleanupError)}).`,
          outputPath
        );
      }
    });
    throw new WriteFailureError(`Could not write ${outputPath}: ${describeError(error)}`, outputPath);
  }
}

async function processFile(
  fileName: string,
  options: BatchOptions,
  engine: PdfRedactionEngine
): Promise<{ outputPath: string; result: PdfRedactionResult }> {
  const inputPath = path.join(options.inputDir, fileName);
  const outputPath = path.join(options.outputDir, fileName);

  let bytes: Uint8Array;
  try {
    bytes = await readFile(inputPath);
  } catch (error) {
    throw new UnreadableDocumentError(`Cannot read ${inputPath}: ${describeError(error)}`, fileName);
  }

  const result = await engine.redactDocument(bytes, fileName);
  await writeFileAtomically(outputPath, result.bytes);
  return { outputPath, result };
}

/**
 * Redacts every PDF in the input directory, one at a time. A failing
 * document is reported and skipped; only a missing input directory stops
 * the run.
 */
export async function runBatch(options: BatchOptions, engine: PdfRedactionEngine, logger: Logger): Promise<BatchReport> {
  const fileNames = await listPdfFiles(options.inputDir);
  const report: BatchReport = {
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    files: [],
    succeeded: 0,
    failed: 0
  };

  logger.info('Starting PDF processing.', { inputDir: options.inputDir, outputDir: options.outputDir, files: fileNames.length });
  logger.info(engine.getSupport().message);
  await mkdir(options.outputDir, { recursive: true });

  if (fileNames.length === 0) {
    logger.info('No PDF files found; nothing to do.');
    return report;
  }

  for (const fileName of fileNames) {
    const fileLogger = logger.child({ file: fileName });
    fileLogger.info('Processing file.');

    try {
      const { outputPath, result } = await processFile(fileName, options, engine);
      report.files.push({
        fileName,
        status: result.status,
        outputPath,
        matchCount: result.matchCount,
        regionCount: result.regionCount,
        failedMatchCount: result.failedMatchCount,
        overlayOnlyCount: result.overlayOnlyCount
      });
      report.succeeded += 1;
      fileLogger.info(result.message, { outputPath });
    } catch (error) {
      report.files.push({
        fileName,
        status: 'failed',
        matchCount: 0,
        regionCount: 0,
        failedMatchCount: 0,
        overlayOnlyCount: 0,
        error: describeError(error)
      });
      report.failed += 1;
      fileLogger.error('File failed.', { reason: describeError(error), kind: error instanceof Error ? error.name : 'unknown' });
    }
  }

  logger.info('Processing finished.', { succeeded: report.succeeded, failed: report.failed });
  return report;
}

export function exitCodeFor(report: BatchReport): number {
  return report.failed > 0 ? EXIT_PARTIAL_FAILURE : EXIT_OK;
}
