/**
 * Content stream text interpreter.
 *
 * Walks the text operators of a page content stream and produces the page's
 * text together with an exact rectangle for every decoded glyph and the
 * location of that glyph's code in the stream.
 */

import type { GlyphRect, PageTextSource } from '../../types';
import type { FontMetrics, FontResolver } from './fonts';
import { parseContentOperations, type ContentOperation, type Operand } from './lexer';
import { applyToPoint, IDENTITY, matrixFromNumbers, multiplyMatrix, translate, type Matrix } from './matrix';

export interface GlyphSource {
  operationIndex: number;
  /** Index inside the TJ array; 0 for Tj, ' and ". */
  elementIndex: number;
  byteOffset: number;
  byteLength: number;
  /** TJ displacement that keeps later glyphs in place once this one is removed. */
  removalAdjustment: number;
}

export interface LayerGlyph {
  text: string;
  rect: GlyphRect;
  source: GlyphSource;
}

export interface ContentTextLayer extends PageTextSource {
  readonly content: Uint8Array;
  readonly operations: ContentOperation[];
  readonly glyphs: LayerGlyph[];
  glyphAt(offset: number): LayerGlyph | undefined;
  /** Number of text-showing operations whose font could not be resolved. */
  readonly unresolvedFontOperations: number;
}

interface TextState {
  font: FontMetrics | undefined;
  fontSize: number;
  charSpacing: number;
  wordSpacing: number;
  horizontalScaling: number;
  leading: number;
  rise: number;
}

interface PenPosition {
  x: number;
  y: number;
  /** Unit vector along the baseline and glyph height, in user space. */
  dirX: number;
  dirY: number;
  height: number;
}

const SAME_LINE_TOLERANCE = 0.5;
const WORD_GAP_RATIO = 0.3;

function numberAt(operands: Operand[], index: number): number | null {
  const operand = operands[index];
  return operand?.type === 'number' ? operand.value : null;
}

function stringAt(operands: Operand[], index: number): Uint8Array | null {
  const operand = operands[index];
  return operand?.type === 'string' ? operand.value : null;
}

function nameAt(operands: Operand[], index: number): string | null {
  const operand = operands[index];
  return operand?.type === 'name' ? operand.value : null;
}

function boundingBox(points: { x: number; y: number }[]): GlyphRect {
  const xs = points.map((point) => point.x);
  const ys = points.map((point) => point.y);
  return { x0: Math.min(...xs), y0: Math.min(...ys), x1: Math.max(...xs), y1: Math.max(...ys) };
}

export function interpretContent(content: Uint8Array, fonts: FontResolver, initialCtm: Matrix = IDENTITY): ContentTextLayer {
  const operations = parseContentOperations(content);
  const glyphs: LayerGlyph[] = [];
  const offsetToGlyph: number[] = [];
  let text = '';
  let unresolvedFontOperations = 0;

  let ctm = initialCtm;
  let tm: Matrix = IDENTITY;
  let tlm: Matrix = IDENTITY;
  let state: TextState = {
    font: undefined,
    fontSize: 0,
    charSpacing: 0,
    wordSpacing: 0,
    horizontalScaling: 1,
    leading: 0,
    rise: 0
  };
  const stack: { ctm: Matrix; state: TextState }[] = [];
  let lastPen: PenPosition | null = null;

  const appendSeparator = (separator: string): void => {
    if (text.length === 0 || text.endsWith('\n') || text.endsWith(separator)) {
      return;
    }
    text += separator;
    offsetToGlyph.push(-1);
  };

  const renderingMatrix = (): Matrix =>
    multiplyMatrix(
      multiplyMatrix([state.fontSize * state.horizontalScaling, 0, 0, state.fontSize, 0, state.rise], tm),
      ctm
    );

  const separateFromPrevious = (trm: Matrix): void => {
    if (!lastPen) {
      return;
    }
    const origin = applyToPoint(trm, 0, 0);
    const deltaX = origin.x - lastPen.x;
    const deltaY = origin.y - lastPen.y;
    const along = deltaX * lastPen.dirX + deltaY * lastPen.dirY;
    const across = deltaY * lastPen.dirX - deltaX * lastPen.dirY;

    if (Math.abs(across) > lastPen.height * SAME_LINE_TOLERANCE || along < -lastPen.height * SAME_LINE_TOLERANCE) {
      appendSeparator('\n');
    } else if (along > lastPen.height * WORD_GAP_RATIO) {
      appendSeparator(' ');
    }
  };

  const showString = (bytes: Uint8Array, operationIndex: number, elementIndex: number): void => {
    const font = state.font;
    if (!font) {
      return;
    }

    const { fontSize, charSpacing, wordSpacing, horizontalScaling } = state;
    const step = font.bytesPerCode;
    let first = true;

    for (let byteOffset = 0; byteOffset + step <= bytes.length; byteOffset += step) {
      const code = step === 2
        ? ((bytes[byteOffset] ?? 0) << 8) | (bytes[byteOffset + 1] ?? 0)
        : (bytes[byteOffset] ?? 0);
      const width = font.widthOf(code) / 1000;
      const isSpace = step === 1 && code === 0x20;
      const spacing = charSpacing + (isSpace ? wordSpacing : 0);
      const trm = renderingMatrix();

      if (first) {
        separateFromPrevious(trm);
        first = false;
      }

      const decoded = font.decode(code);
      if (decoded) {
        const rect = boundingBox([
          applyToPoint(trm, 0, font.descent / 1000),
          applyToPoint(trm, width, font.descent / 1000),
          applyToPoint(trm, 0, font.ascent / 1000),
          applyToPoint(trm, width, font.ascent / 1000)
        ]);
        const glyphIndex = glyphs.length;
        glyphs.push({
          text: decoded,
          rect,
          source: {
            operationIndex,
            elementIndex,
            byteOffset,
            byteLength: step,
            removalAdjustment: -(width * 1000 + (fontSize !== 0 ? (spacing * 1000) / fontSize : 0))
          }
        });
        text += decoded;
        for (let index = 0; index < decoded.length; index += 1) {
          offsetToGlyph.push(glyphIndex);
        }
      }

      tm = translate((width * fontSize + spacing) * horizontalScaling, 0, tm);

      const end = applyToPoint(renderingMatrix(), 0, 0);
      const baseline = applyToPoint(trm, 1, 0);
      const top = applyToPoint(trm, 0, 1);
      const origin = applyToPoint(trm, 0, 0);
      const length = Math.hypot(baseline.x - origin.x, baseline.y - origin.y) || 1;
      lastPen = {
        x: end.x,
        y: end.y,
        dirX: (baseline.x - origin.x) / length,
        dirY: (baseline.y - origin.y) / length,
        height: Math.hypot(top.x - origin.x, top.y - origin.y) || 1
      };
    }
  };

  const nextLine = (): void => {
    tlm = translate(0, -state.leading, tlm);
    tm = tlm;
  };

  const requireFont = (): boolean => {
    if (state.font) {
      return true;
    }
    unresolvedFontOperations += 1;
    return false;
  };

  operations.forEach((operation, operationIndex) => {
    const { operands } = operation;

    switch (operation.operator) {
      case 'q':
        stack.push({ ctm, state: { ...state } });
        break;
      case 'Q': {
        const saved = stack.pop();
        if (saved) {
          ctm = saved.ctm;
          state = saved.state;
        }
        break;
      }
      case 'cm': {
        const matrix = matrixFromNumbers(operands.map((_, index) => numberAt(operands, index)));
        if (matrix) ctm = multiplyMatrix(matrix, ctm);
        break;
      }
      case 'BT':
        tm = IDENTITY;
        tlm = IDENTITY;
        break;
      case 'Tf': {
        const name = nameAt(operands, 0);
        state.font = name !== null ? fonts.get(name) : undefined;
        state.fontSize = numberAt(operands, 1) ?? state.fontSize;
        break;
      }
      case 'Tc':
        state.charSpacing = numberAt(operands, 0) ?? 0;
        break;
      case 'Tw':
        state.wordSpacing = numberAt(operands, 0) ?? 0;
        break;
      case 'Tz':
        state.horizontalScaling = (numberAt(operands, 0) ?? 100) / 100;
        break;
      case 'TL':
        state.leading = numberAt(operands, 0) ?? 0;
        break;
      case 'Ts':
        state.rise = numberAt(operands, 0) ?? 0;
        break;
      case 'Td':
      case 'TD': {
        const tx = numberAt(operands, 0) ?? 0;
        const ty = numberAt(operands, 1) ?? 0;
        if (operation.operator === 'TD') state.leading = -ty;
        tlm = translate(tx, ty, tlm);
        tm = tlm;
        break;
      }
      case 'Tm': {
        const matrix = matrixFromNumbers(operands.map((_, index) => numberAt(operands, index)));
        if (matrix) {
          tm = matrix;
          tlm = matrix;
        }
        break;
      }
      case 'T*':
        nextLine();
        break;
      case 'Tj': {
        const bytes = stringAt(operands, 0);
        if (bytes && requireFont()) showString(bytes, operationIndex, 0);
        break;
      }
      case "'": {
        nextLine();
        const bytes = stringAt(operands, 0);
        if (bytes && requireFont()) showString(bytes, operationIndex, 0);
        break;
      }
      case '"': {
        state.wordSpacing = numberAt(operands, 0) ?? state.wordSpacing;
        state.charSpacing = numberAt(operands, 1) ?? state.charSpacing;
        nextLine();
        const bytes = stringAt(operands, 2);
        if (bytes && requireFont()) showString(bytes, operationIndex, 0);
        break;
      }
      case 'TJ': {
        const array = operands[0];
        if (array?.type !== 'array' || !requireFont()) break;
        array.value.forEach((element, elementIndex) => {
          if (element.type === 'string') {
            showString(element.value, operationIndex, elementIndex);
          } else if (element.type === 'number') {
            tm = translate((-element.value / 1000) * state.fontSize * state.horizontalScaling, 0, tm);
          }
        });
        break;
      }
    }
  });

  const glyphAt = (offset: number): LayerGlyph | undefined => {
    const index = offsetToGlyph[offset];
    return index === undefined || index < 0 ? undefined : glyphs[index];
  };

  return {
    content,
    operations,
    glyphs,
    text,
    unresolvedFontOperations,
    glyphAt,
    rectAt: (offset) => glyphAt(offset)?.rect
  };
}
