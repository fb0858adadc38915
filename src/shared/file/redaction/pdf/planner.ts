import { GeometryLookupError } from '../../../errors';
import { maskCpfDigits } from '../../../pii/validators';
import {
	CPF_DIGIT_COUNT,
	MASKED_DIGIT_RUNS,
	PRESERVED_DIGITS,
	type CpfMatch,
	type GlyphRect,
	type PageTextSource
} from '../../../types';
import type { RedactionRun } from './types';

type ReadingAxis = 'x' | 'y';

export function unionRects(rects: GlyphRect[]): GlyphRect {
	return {
		x0: Math.min(...rects.map((rect) => rect.x0)),
		y0: Math.min(...rects.map((rect) => rect.y0)),
		x1: Math.max(...rects.map((rect) => rect.x1)),
		y1: Math.max(...rects.map((rect) => rect.y1))
	};
}

/** True when the two rectangles share a positive area. */
export function rectsOverlap(left: GlyphRect, right: GlyphRect): boolean {
	const width = Math.min(left.x1, right.x1) - Math.max(left.x0, right.x0);
	const height = Math.min(left.y1, right.y1) - Math.max(left.y0, right.y0);
	return width > 0 && height > 0;
}

function expandRect(rect: GlyphRect, margin: number): GlyphRect {
	return { x0: rect.x0 - margin, y0: rect.y0 - margin, x1: rect.x1 + margin, y1: rect.y1 + margin };
}

function centre(rect: GlyphRect): { x: number; y: number } {
	return { x: (rect.x0 + rect.x1) / 2, y: (rect.y0 + rect.y1) / 2 };
}

function readingAxis(first: GlyphRect, last: GlyphRect): ReadingAxis {
	const from = centre(first);
	const to = centre(last);
	return Math.abs(to.x - from.x) >= Math.abs(to.y - from.y) ? 'x' : 'y';
}

/**
 * Trim the run along the reading axis until it no longer covers any
 * preserved glyph.
 */
function clipAgainst(rect: GlyphRect, preserved: GlyphRect[], axis: ReadingAxis): GlyphRect {
	let clipped = { ...rect };

	for (const keep of preserved) {
		if (!rectsOverlap(clipped, keep)) {
			continue;
		}
		const runCentre = centre(clipped);
		const keepCentre = centre(keep);
		if (axis === 'x') {
			clipped = runCentre.x < keepCentre.x
				? { ...clipped, x1: Math.max(clipped.x0, Math.min(clipped.x1, keep.x0)) }
				: { ...clipped, x0: Math.min(clipped.x1, Math.max(clipped.x0, keep.x1)) };
		} else {
			clipped = runCentre.y < keepCentre.y
				? { ...clipped, y1: Math.max(clipped.y0, Math.min(clipped.y1, keep.y0)) }
				: { ...clipped, y0: Math.min(clipped.y1, Math.max(clipped.y0, keep.y1)) };
		}
	}

	return clipped;
}

function resolveDigitRects(match: CpfMatch, source: PageTextSource): GlyphRect[] {
	if (match.digitPositions.length !== CPF_DIGIT_COUNT) {
		throw new GeometryLookupError(
			`Match ${maskCpfDigits(match.rawText)} has ${match.digitPositions.length} digits.`,
			match.startOffset
		);
	}

	return match.digitPositions.map((position) => {
		const rect = source.rectAt(position.offset);
		if (!rect) {
			throw new GeometryLookupError(
				`No glyph rectangle for digit ${position.digitIndex} of ${maskCpfDigits(match.rawText)} at offset ${position.offset}.`,
				position.offset
			);
		}
		return rect;
	});
}

/**
 * One painted run for digits 0-2 and one for digits 9-10. Throws
 * GeometryLookupError when any digit of the match has no rectangle.
 */
export function planRedaction(match: CpfMatch, source: PageTextSource, margin: number): RedactionRun[] {
	const digitRects = resolveDigitRects(match, source);
	const preserved = PRESERVED_DIGITS.flatMap((digitIndex) => digitRects[digitIndex] ?? []);
	const first = digitRects[0];
	const last = digitRects[CPF_DIGIT_COUNT - 1];
	const axis = first && last ? readingAxis(first, last) : 'x';

	return MASKED_DIGIT_RUNS.map((digitIndices) => {
		const glyphRects = digitIndices.flatMap((digitIndex) => digitRects[digitIndex] ?? []);
		const rect = clipAgainst(expandRect(unionRects(glyphRects), margin), preserved, axis);
		return { digitIndices: [...digitIndices], rect, glyphRects };
	});
}
