/**
 * Removes glyph codes from text-showing operators.
 *
 * Each removed code is replaced with a TJ displacement equal to its advance,
 * so the glyphs that stay are drawn exactly where they were.
 */

import type { ContentOperation, Operand } from './lexer';
import { concatBytes } from './page-content';
import type { ContentTextLayer, GlyphSource } from './text-layer';

type ArrayItem = { kind: 'string'; bytes: Uint8Array } | { kind: 'number'; value: number };

const encoder = new TextEncoder();

export function formatNumber(value: number): string {
  const rounded = Number(value.toFixed(3));
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => byte.toString(16).toUpperCase().padStart(2, '0')).join('');
}

function splitString(bytes: Uint8Array, removals: GlyphSource[]): ArrayItem[] {
  const byOffset = new Map(removals.map((source) => [source.byteOffset, source]));
  const items: ArrayItem[] = [];
  let kept: number[] = [];
  let pendingShift = 0;

  const flushKept = (): void => {
    if (kept.length > 0) {
      items.push({ kind: 'string', bytes: Uint8Array.from(kept) });
      kept = [];
    }
  };
  const flushShift = (): void => {
    if (pendingShift !== 0) {
      items.push({ kind: 'number', value: pendingShift });
      pendingShift = 0;
    }
  };

  for (let offset = 0; offset < bytes.length; ) {
    const removal = byOffset.get(offset);
    if (removal) {
      flushKept();
      pendingShift += removal.removalAdjustment;
      offset += removal.byteLength;
      continue;
    }
    flushShift();
    kept.push(bytes[offset] ?? 0);
    offset += 1;
  }

  flushKept();
  flushShift();
  return items;
}

function mergeAdjacentNumbers(items: ArrayItem[]): ArrayItem[] {
  const merged: ArrayItem[] = [];
  for (const item of items) {
    const previous = merged[merged.length - 1];
    if (item.kind === 'number' && previous?.kind === 'number') {
      merged[merged.length - 1] = { kind: 'number', value: previous.value + item.value };
    } else {
      merged.push(item);
    }
  }
  return merged;
}

function serializeArray(items: ArrayItem[]): string {
  const body = mergeAdjacentNumbers(items)
    .map((item) => (item.kind === 'string' ? `<${toHex(item.bytes)}>` : formatNumber(item.value)))
    .join(' ');
  return `[${body}] TJ`;
}

function operandNumber(operand: Operand | undefined): string {
  return operand?.type === 'number' ? formatNumber(operand.value) : '0';
}

function rewriteOperation(operation: ContentOperation, removals: Map<number, GlyphSource[]>): string | null {
  const { operator, operands } = operation;

  if (operator === 'TJ') {
    const array = operands[0];
    if (array?.type !== 'array') return null;
    const items: ArrayItem[] = [];
    array.value.forEach((element, elementIndex) => {
      if (element.type === 'number') {
        items.push({ kind: 'number', value: element.value });
      } else if (element.type === 'string') {
        items.push(...splitString(element.value, removals.get(elementIndex) ?? []));
      }
    });
    return serializeArray(items);
  }

  const stringIndex = operator === '"' ? 2 : 0;
  const shown = operands[stringIndex];
  if (shown?.type !== 'string') return null;
  const array = serializeArray(splitString(shown.value, removals.get(0) ?? []));

  switch (operator) {
    case 'Tj':
      return array;
    case "'":
      return `T* ${array}`;
    case '"':
      return `${operandNumber(operands[0])} Tw ${operandNumber(operands[1])} Tc T* ${array}`;
    default:
      return null;
  }
}

/**
 * Content bytes with the given glyphs removed. Untouched operations keep
 * their original bytes.
 */
export function scrubGlyphs(layer: ContentTextLayer, glyphIndices: Iterable<number>): Uint8Array {
  const byOperation = new Map<number, Map<number, GlyphSource[]>>();

  for (const glyphIndex of glyphIndices) {
    const glyph = layer.glyphs[glyphIndex];
    if (!glyph) continue;
    const { operationIndex, elementIndex } = glyph.source;
    const elements = byOperation.get(operationIndex) ?? new Map<number, GlyphSource[]>();
    const sources = elements.get(elementIndex) ?? [];
    if (!sources.some((source) => source.byteOffset === glyph.source.byteOffset)) {
      sources.push(glyph.source);
    }
    elements.set(elementIndex, sources);
    byOperation.set(operationIndex, elements);
  }

  if (byOperation.size === 0) {
    return layer.content;
  }

  const parts: Uint8Array[] = [];
  let cursor = 0;
  const operationIndices = Array.from(byOperation.keys()).sort((left, right) => left - right);

  for (const operationIndex of operationIndices) {
    const operation = layer.operations[operationIndex];
    const removals = byOperation.get(operationIndex);
    if (!operation || !removals) continue;

    const replacement = rewriteOperation(operation, removals);
    if (replacement === null) continue;

    parts.push(layer.content.subarray(cursor, operation.start));
    parts.push(encoder.encode(replacement));
    cursor = operation.end;
  }

  parts.push(layer.content.subarray(cursor));
  return concatBytes(parts);
}
