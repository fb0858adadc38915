import * as pdfjs from 'pdfjs-dist/legacy/build/pdf.mjs';
import { describeError } from '../../errors';
import { createLogger, type Logger } from '../../logger';
import type { GlyphRect, PageTextSource } from '../../types';
import type { PdfTextSpan } from '../redaction/pdf/types';

export interface PdfPageSpans {
  pageNumber: number;
  text: string;
  spans: PdfTextSpan[];
}

/** Share of the item height that sits below the baseline. */
const DESCENT_RATIO = 0.2;
const MIN_ITEM_HEIGHT = 1;

function pushSpan(
  spans: PdfTextSpan[],
  pageNumber: number,
  tokenText: string,
  cursor: number,
  bbox?: PdfTextSpan['bbox']
): number {
  const start = cursor;
  const end = start + tokenText.length;
  spans.push({
    pageNumber,
    start,
    end,
    text: tokenText,
    bbox
  });
  return end;
}

async function extractPageSpans(page: pdfjs.PDFPageProxy, pageNumber: number): Promise<PdfPageSpans> {
  const textContent = await page.getTextContent();
  const spans: PdfTextSpan[] = [];
  let text = '';
  let cursor = 0;
  let lineBreakPending = false;

  for (const item of textContent.items) {
    if (!('str' in item)) {
      continue;
    }

    const tokenText = item.str;
    if (!tokenText) {
      lineBreakPending = lineBreakPending || item.hasEOL;
      continue;
    }

    if (text.length > 0) {
      text += lineBreakPending ? '\n' : ' ';
      cursor += 1;
    }
    lineBreakPending = item.hasEOL;

    const transform: number[] = item.transform;
    const horizontal = (transform[1] ?? 0) === 0 && (transform[2] ?? 0) === 0;
    const height = Math.max(Number(item.height || Math.abs(transform[3] ?? 0)), MIN_ITEM_HEIGHT);

    cursor = pushSpan(
      spans,
      pageNumber,
      tokenText,
      cursor,
      horizontal && item.width > 0
        ? {
          x: Number(transform[4] ?? 0),
          y: Number(transform[5] ?? 0),
          width: item.width,
          height
        }
        : undefined
    );
    text += tokenText;
  }

  return { pageNumber, text, spans };
}

/**
 * Text items of every page, with item-level boxes in PDF user space.
 * Offsets in each span are relative to that page's text.
 */
export async function extractPdfSpans(bytes: Uint8Array, logger: Logger = createLogger('pdf-decoder')): Promise<PdfPageSpans[]> {
  // pdf.js takes ownership of the buffer it is given.
  const loadingTask = pdfjs.getDocument({
    data: new Uint8Array(bytes),
    verbosity: pdfjs.VerbosityLevel.ERRORS,
    isEvalSupported: false
  });

  try {
    const doc = await loadingTask.promise;
    const pages: PdfPageSpans[] = [];
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber += 1) {
      const page = await doc.getPage(pageNumber);
      pages.push(await extractPageSpans(page, pageNumber));
    }
    return pages;
  } finally {
    await loadingTask.destroy().catch((error: unknown) => {
      logger.warn('PDF.js loading task teardown failed.', { reason: describeError(error) });
    });
  }
}

function interpolateRect(span: PdfTextSpan, index: number): GlyphRect | undefined {
  const bbox = span.bbox;
  const length = span.end - span.start;
  if (!bbox || length <= 0) {
    return undefined;
  }

  const step = bbox.width / length;
  return {
    x0: bbox.x + step * index,
    y0: bbox.y - bbox.height * DESCENT_RATIO,
    x1: bbox.x + step * (index + 1),
    y1: bbox.y + bbox.height
  };
}

/**
 * Offset lookup over item boxes. Characters share their item's width evenly,
 * which is exact for monospaced text and an estimate otherwise.
 */
export function createSpanTextSource(page: PdfPageSpans): PageTextSource {
  return {
    text: page.text,
    rectAt(offset) {
      const span = page.spans.find((candidate) => offset >= candidate.start && offset < candidate.end);
      return span ? interpolateRect(span, offset - span.start) : undefined;
    }
  };
}
