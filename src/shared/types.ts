export interface DetectionPattern {
  key: string;
  regex: RegExp;
}

export interface DigitPosition {
  digitIndex: number;
  offset: number;
}

export interface CpfMatch {
  patternKey: string;
  rawText: string;
  startOffset: number;
  endOffset: number;
  digitPositions: DigitPosition[];
}

export interface CpfLocator {
  findCpfs(pageText: string): CpfMatch[];
}

/** Axis-aligned box in PDF user space (origin bottom-left). */
export interface GlyphRect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface PageTextSource {
  readonly text: string;
  rectAt(offset: number): GlyphRect | undefined;
}

export const CPF_DIGIT_COUNT = 11;
export const MASKED_DIGIT_RUNS: readonly (readonly number[])[] = [
  [0, 1, 2],
  [9, 10]
];
export const PRESERVED_DIGITS: readonly number[] = [3, 4, 5, 6, 7, 8];
