import { decodePDFRawStream, PDFArray, PDFName, PDFRawStream, type PDFPage } from 'pdf-lib';
import { ContentStreamError } from '../../errors';

const NEWLINE = Uint8Array.of(0x0a);

export function concatBytes(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const output = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    output.set(part, offset);
    offset += part.length;
  }
  return output;
}

function decodeStream(stream: unknown, pageNumber: number): Uint8Array {
  if (!(stream instanceof PDFRawStream)) {
    throw new ContentStreamError(`Page ${pageNumber} has a content entry that is not a stream.`, pageNumber);
  }
  try {
    return decodePDFRawStream(stream).decode();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ContentStreamError(`Page ${pageNumber} content stream could not be decoded: ${reason}`, pageNumber);
  }
}

/**
 * Decoded page content; multiple content streams are joined with a newline
 * as the format treats them as one stream.
 */
export function readPageContent(page: PDFPage, pageNumber: number): Uint8Array {
  const contents = page.node.Contents();
  if (!contents) {
    return new Uint8Array(0);
  }

  if (contents instanceof PDFArray) {
    const parts: Uint8Array[] = [];
    for (let index = 0; index < contents.size(); index += 1) {
      if (parts.length > 0) {
        parts.push(NEWLINE);
      }
      parts.push(decodeStream(contents.lookup(index), pageNumber));
    }
    return concatBytes(parts);
  }

  return decodeStream(contents, pageNumber);
}

/**
 * Replace the page's content with a single flate stream wrapped in a saved
 * graphics state, so anything appended afterwards starts from default user
 * space.
 */
export function writePageContent(page: PDFPage, content: Uint8Array): void {
  const context = page.doc.context;
  const wrapped = concatBytes([Uint8Array.from([0x71, 0x0a]), content, Uint8Array.from([0x0a, 0x51, 0x0a])]);
  const streamRef = context.register(context.flateStream(wrapped));
  page.node.set(PDFName.of('Contents'), context.obj([streamRef]));
}
