/**
 * Font metrics for content-stream interpretation.
 *
 * Resolves a page's font resources into code decoding and glyph widths, the
 * two things needed to place each glyph and to remove one without moving
 * its neighbours.
 */

import { Encodings, Font, FontNames } from '@pdf-lib/standard-fonts';
import {
  decodePDFRawStream,
  PDFArray,
  PDFDict,
  PDFName,
  PDFNumber,
  PDFRawStream,
  type PDFObject
} from 'pdf-lib';
import { describeError } from '../../errors';
import { createLogger, type Logger } from '../../logger';
import { parseToUnicodeCMap, type ToUnicodeMap } from './cmap';

export interface FontMetrics {
  readonly baseFont: string;
  readonly bytesPerCode: 1 | 2;
  /** Ascent and descent in thousandths of text space. */
  readonly ascent: number;
  readonly descent: number;
  decode(code: number): string | undefined;
  /** Glyph advance in thousandths of text space. */
  widthOf(code: number): number;
}

export interface FontResolver {
  get(resourceName: string): FontMetrics | undefined;
}

const DEFAULT_ASCENT = 800;
const DEFAULT_DESCENT = -200;
const DEFAULT_SIMPLE_WIDTH = 500;
const DEFAULT_COMPOSITE_WIDTH = 1000;

const STANDARD_FONT_ALIASES: Record<string, FontNames> = {
  Arial: FontNames.Helvetica,
  'Arial,Bold': FontNames.HelveticaBold,
  'Arial-BoldMT': FontNames.HelveticaBold,
  ArialMT: FontNames.Helvetica,
  CourierNew: FontNames.Courier,
  'CourierNew,Bold': FontNames.CourierBold,
  TimesNewRoman: FontNames.TimesRoman,
  'TimesNewRoman,Bold': FontNames.TimesRomanBold,
  TimesNewRomanPSMT: FontNames.TimesRoman
};

const GLYPH_NAMES: Record<string, string> = {
  space: ' ',
  period: '.',
  hyphen: '-',
  minus: '-',
  comma: ',',
  colon: ':',
  semicolon: ';',
  slash: '/',
  zero: '0',
  one: '1',
  two: '2',
  three: '3',
  four: '4',
  five: '5',
  six: '6',
  seven: '7',
  eight: '8',
  nine: '9'
};

function isStandardFontName(name: string): name is FontNames {
  return Object.values<string>(FontNames).includes(name);
}

function nameText(value: PDFObject | undefined): string | undefined {
  return value instanceof PDFName ? value.asString().replace(/^\//, '') : undefined;
}

function numberValue(value: PDFObject | undefined): number | undefined {
  return value instanceof PDFNumber ? value.asNumber() : undefined;
}

function lookupDict(dict: PDFDict, key: string): PDFDict | undefined {
  const value = dict.lookup(PDFName.of(key));
  return value instanceof PDFDict ? value : undefined;
}

function lookupArray(dict: PDFDict, key: string): PDFArray | undefined {
  const value = dict.lookup(PDFName.of(key));
  return value instanceof PDFArray ? value : undefined;
}

function arrayNumbers(array: PDFArray): (number | undefined)[] {
  const values: (number | undefined)[] = [];
  for (let index = 0; index < array.size(); index += 1) {
    values.push(numberValue(array.lookup(index)));
  }
  return values;
}

export function glyphNameToUnicode(name: string): string | undefined {
  const known = GLYPH_NAMES[name];
  if (known !== undefined) {
    return known;
  }
  const uni = /^uni([0-9A-Fa-f]{4})$/.exec(name) ?? /^u([0-9A-Fa-f]{4,6})$/.exec(name);
  if (uni?.[1]) {
    return String.fromCodePoint(Number.parseInt(uni[1], 16));
  }
  return name.length === 1 ? name : undefined;
}

function loadToUnicode(fontDict: PDFDict, baseFont: string, logger: Logger): ToUnicodeMap | undefined {
  const stream = fontDict.lookup(PDFName.of('ToUnicode'));
  if (!(stream instanceof PDFRawStream)) {
    return undefined;
  }
  try {
    return parseToUnicodeCMap(decodePDFRawStream(stream).decode());
  } catch (error) {
    logger.warn('Ignoring unreadable ToUnicode CMap.', { font: baseFont, reason: describeError(error) });
    return undefined;
  }
}

function parseDifferences(fontDict: PDFDict): Map<number, string> {
  const differences = new Map<number, string>();
  const encoding = lookupDict(fontDict, 'Encoding');
  const entries = encoding ? lookupArray(encoding, 'Differences') : undefined;
  if (!entries) {
    return differences;
  }

  let code = 0;
  for (let index = 0; index < entries.size(); index += 1) {
    const entry = entries.lookup(index);
    const asNumber = numberValue(entry);
    if (asNumber !== undefined) {
      code = asNumber;
      continue;
    }
    const glyph = nameText(entry);
    if (glyph !== undefined) {
      differences.set(code, glyph);
      code += 1;
    }
  }

  return differences;
}

function descriptorMetrics(descriptor: PDFDict | undefined): { ascent?: number; descent?: number; missingWidth?: number } {
  if (!descriptor) {
    return {};
  }
  return {
    ascent: numberValue(descriptor.lookup(PDFName.of('Ascent'))),
    descent: numberValue(descriptor.lookup(PDFName.of('Descent'))),
    missingWidth: numberValue(descriptor.lookup(PDFName.of('MissingWidth')))
  };
}

function resolveStandardFont(baseFont: string): Font | undefined {
  const name = STANDARD_FONT_ALIASES[baseFont] ?? baseFont;
  return isStandardFontName(name) ? Font.load(name) : undefined;
}

function buildSimpleFont(fontDict: PDFDict, baseFont: string, logger: Logger): FontMetrics {
  const toUnicode = loadToUnicode(fontDict, baseFont, logger);
  const differences = parseDifferences(fontDict);
  const descriptor = descriptorMetrics(lookupDict(fontDict, 'FontDescriptor'));
  const standard = resolveStandardFont(baseFont);
  const encoding = baseFont === FontNames.Symbol
    ? Encodings.Symbol
    : baseFont === FontNames.ZapfDingbats ? Encodings.ZapfDingbats : Encodings.WinAnsi;

  const firstChar = numberValue(fontDict.lookup(PDFName.of('FirstChar'))) ?? 0;
  const widthsArray = lookupArray(fontDict, 'Widths');
  const widths = widthsArray ? arrayNumbers(widthsArray) : [];

  // Type3 glyph space is defined by FontMatrix rather than thousandths.
  const fontMatrix = lookupArray(fontDict, 'FontMatrix');
  const widthScale = fontMatrix ? (numberValue(fontMatrix.lookup(0)) ?? 0.001) * 1000 : 1;

  const decode = (code: number): string | undefined => {
    const mapped = toUnicode?.get(code);
    if (mapped !== undefined) {
      return mapped;
    }
    const glyph = differences.get(code);
    if (glyph !== undefined) {
      return glyphNameToUnicode(glyph);
    }
    if (toUnicode && toUnicode.size > 0) {
      return undefined;
    }
    return code >= 0x20 ? String.fromCharCode(code) : undefined;
  };

  const standardGlyphName = (code: number): string | undefined => {
    const glyph = differences.get(code);
    if (glyph !== undefined) {
      return glyph;
    }
    const codePoint = String.fromCharCode(code).codePointAt(0);
    if (codePoint === undefined || !encoding.canEncodeUnicodeCodePoint(codePoint)) {
      return undefined;
    }
    return encoding.encodeUnicodeCodePoint(codePoint).name;
  };

  const fallbackWidth = descriptor.missingWidth ?? DEFAULT_SIMPLE_WIDTH;

  return {
    baseFont,
    bytesPerCode: 1,
    ascent: descriptor.ascent ?? (standard ? standard.Ascender || standard.FontBBox[3] || DEFAULT_ASCENT : DEFAULT_ASCENT),
    descent: descriptor.descent ?? (standard ? standard.Descender || standard.FontBBox[1] || DEFAULT_DESCENT : DEFAULT_DESCENT),
    decode,
    widthOf(code) {
      const declared = widths[code - firstChar];
      if (declared !== undefined) {
        return declared * widthScale;
      }
      if (standard) {
        const glyph = standardGlyphName(code);
        const width = glyph ? standard.getWidthOfGlyph(glyph) : undefined;
        return typeof width === 'number' && width > 0 ? width : fallbackWidth;
      }
      return fallbackWidth;
    }
  };
}

function parseCidWidths(array: PDFArray): Map<number, number> {
  const widths = new Map<number, number>();
  let index = 0;

  while (index < array.size()) {
    const first = numberValue(array.lookup(index));
    const next = array.lookup(index + 1);
    if (first === undefined) {
      index += 1;
      continue;
    }

    if (next instanceof PDFArray) {
      arrayNumbers(next).forEach((width, offset) => {
        if (width !== undefined) widths.set(first + offset, width);
      });
      index += 2;
      continue;
    }

    const last = numberValue(next);
    const width = numberValue(array.lookup(index + 2));
    if (last !== undefined && width !== undefined) {
      for (let cid = first; cid <= last; cid += 1) {
        widths.set(cid, width);
      }
    }
    index += 3;
  }

  return widths;
}

function buildCompositeFont(fontDict: PDFDict, baseFont: string, logger: Logger): FontMetrics {
  const toUnicode = loadToUnicode(fontDict, baseFont, logger);
  const descendants = lookupArray(fontDict, 'DescendantFonts');
  const descendantValue = descendants?.lookup(0);
  const descendant = descendantValue instanceof PDFDict ? descendantValue : undefined;
  const descriptor = descriptorMetrics(descendant ? lookupDict(descendant, 'FontDescriptor') : undefined);
  const defaultWidth = (descendant ? numberValue(descendant.lookup(PDFName.of('DW'))) : undefined) ?? DEFAULT_COMPOSITE_WIDTH;
  const widthArray = descendant ? lookupArray(descendant, 'W') : undefined;
  const widths = widthArray ? parseCidWidths(widthArray) : new Map<number, number>();

  // Only 2-byte encodings are handled; CID equals code for Identity-H/V.
  return {
    baseFont,
    bytesPerCode: 2,
    ascent: descriptor.ascent ?? DEFAULT_ASCENT,
    descent: descriptor.descent ?? DEFAULT_DESCENT,
    decode: (code) => toUnicode?.get(code),
    widthOf: (code) => widths.get(code) ?? defaultWidth
  };
}

export function buildFontMetrics(fontDict: PDFDict, logger: Logger): FontMetrics {
  const subtype = nameText(fontDict.lookup(PDFName.of('Subtype')));
  const baseFont = (nameText(fontDict.lookup(PDFName.of('BaseFont'))) ?? 'Unknown').replace(/^[A-Z]{6}\+/, '');

  return subtype === 'Type0' ? buildCompositeFont(fontDict, baseFont, logger) : buildSimpleFont(fontDict, baseFont, logger);
}

export function createFontResolver(resources: PDFDict | undefined, logger: Logger = createLogger('fonts')): FontResolver {
  const fontDict = resources ? lookupDict(resources, 'Font') : undefined;
  const cache = new Map<string, FontMetrics | undefined>();

  return {
    get(resourceName) {
      if (cache.has(resourceName)) {
        return cache.get(resourceName);
      }
      const entry = fontDict?.lookup(PDFName.of(resourceName));
      const metrics = entry instanceof PDFDict ? buildFontMetrics(entry, logger) : undefined;
      cache.set(resourceName, metrics);
      return metrics;
    }
  };
}
