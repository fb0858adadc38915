import type { CpfMatch, GlyphRect } from '../../../types';

export interface RgbColor {
	red: number;
	green: number;
	blue: number;
}

export interface RedactionOptions {
	fillColor: RgbColor;
	/** Points added on every side of a masked run before clipping. */
	margin: number;
	/** Glyph drawn centred on each masked digit, if set. */
	placeholder?: string;
	placeholderColor: RgbColor;
	scrubTextLayer: boolean;
}

export const DEFAULT_REDACTION_OPTIONS: RedactionOptions = {
	fillColor: { red: 0, green: 0, blue: 0 },
	margin: 1,
	placeholderColor: { red: 1, green: 1, blue: 1 },
	scrubTextLayer: true
};

export interface PdfRedactionSupport {
	status: 'ready';
	objectLevelRemoval: boolean;
	message: string;
}

export interface PdfTextSpan {
	pageNumber: number;
	/** Offsets into the page text. */
	start: number;
	end: number;
	text: string;
	bbox?: {
		x: number;
		y: number;
		width: number;
		height: number;
	};
}

export type GeometrySource = 'content' | 'spans';

export interface RedactionRun {
	digitIndices: number[];
	/** Area painted over, margin and clipping applied. */
	rect: GlyphRect;
	glyphRects: GlyphRect[];
}

export interface RedactionTarget {
	match: CpfMatch;
	source: GeometrySource;
	runs: RedactionRun[];
}

export interface PageRedactionPlan {
	pageNumber: number;
	targets: RedactionTarget[];
	/** Matches skipped because an offset had no rectangle. */
	failures: number;
	/** Targets painted over without removing their text. */
	overlayOnly: number;
	scrubbedGlyphs: number;
}

export interface PdfRedactionResult {
	status: 'redacted' | 'unchanged';
	bytes: Uint8Array;
	message: string;
	pageCount: number;
	matchCount: number;
	regionCount: number;
	failedMatchCount: number;
	overlayOnlyCount: number;
	scrubbedGlyphCount: number;
	plans: PageRedactionPlan[];
}

export interface PdfRedactionEngine {
	getSupport(): PdfRedactionSupport;
	redactDocument(bytes: Uint8Array, fileName?: string): Promise<PdfRedactionResult>;
}
