import { PDFDict, PDFDocument, PDFName, rgb, StandardFonts, type PDFFont, type PDFPage } from 'pdf-lib';
import { createSpanTextSource, extractPdfSpans, type PdfPageSpans } from '../../decoders/pdf';
import { createFontResolver } from '../../content/fonts';
import { readPageContent, writePageContent } from '../../content/page-content';
import { scrubGlyphs } from '../../content/scrub';
import { interpretContent, type ContentTextLayer } from '../../content/text-layer';
import { describeError, GeometryLookupError, UnreadableDocumentError } from '../../../errors';
import { createLogger, type Logger } from '../../../logger';
import { createCpfLocator } from '../../../pii/detector';
import { maskCpfDigits } from '../../../pii/validators';
import type { CpfLocator, CpfMatch, GlyphRect, PageTextSource } from '../../../types';
import { planRedaction, rectsOverlap } from './planner';
import {
	DEFAULT_REDACTION_OPTIONS,
	type GeometrySource,
	type PageRedactionPlan,
	type PdfRedactionEngine,
	type PdfRedactionResult,
	type PdfRedactionSupport,
	type RedactionOptions,
	type RedactionTarget,
	type RgbColor
} from './types';

const PDF_REDACTION_MESSAGE =
	'PDF redaction is enabled. Masked digits are painted over and removed from the text layer.';
const PDF_OVERLAY_ONLY_MESSAGE =
	'PDF redaction is enabled in overlay mode. Masked digits stay in the text layer.';

/** Placeholder size relative to the masked glyph height. */
const PLACEHOLDER_SCALE = 0.7;

export interface PdfRedactionEngineConfig {
	options?: Partial<RedactionOptions>;
	locator?: CpfLocator;
	logger?: Logger;
}

interface PageLayers {
	content: ContentTextLayer | null;
	spans: PdfPageSpans | undefined;
}

function toRgb(color: RgbColor) {
	return rgb(color.red, color.green, color.blue);
}

function rectSize(rect: GlyphRect): { width: number; height: number } {
	return { width: rect.x1 - rect.x0, height: rect.y1 - rect.y0 };
}

function pageResources(page: PDFPage): PDFDict | undefined {
	return page.doc.context.lookupMaybe(page.node.getInheritableAttribute(PDFName.of('Resources')), PDFDict);
}

class PdfLibRedactionEngine implements PdfRedactionEngine {
	private readonly options: RedactionOptions;
	private readonly locator: CpfLocator;
	private readonly logger: Logger;

	constructor(config: PdfRedactionEngineConfig) {
		this.options = { ...DEFAULT_REDACTION_OPTIONS, ...config.options };
		this.locator = config.locator ?? createCpfLocator();
		this.logger = config.logger ?? createLogger('pdf-redaction');
	}

	getSupport(): PdfRedactionSupport {
		return {
			status: 'ready',
			objectLevelRemoval: this.options.scrubTextLayer,
			message: this.options.scrubTextLayer ? PDF_REDACTION_MESSAGE : PDF_OVERLAY_ONLY_MESSAGE
		};
	}

	async redactDocument(bytes: Uint8Array, fileName?: string): Promise<PdfRedactionResult> {
		const logger = fileName ? this.logger.child({ file: fileName }) : this.logger;
		const document = await this.loadDocument(bytes, fileName);
		const spanPages = await this.loadSpans(bytes, logger);
		const pages = document.getPages();
		const plans: PageRedactionPlan[] = [];
		let placeholderFont: PDFFont | undefined;

		for (const [index, page] of pages.entries()) {
			const pageNumber = index + 1;
			const pageLogger = logger.child({ page: pageNumber });
			const layers: PageLayers = {
				content: this.loadContentLayer(page, pageNumber, pageLogger),
				spans: spanPages[index]
			};

			const plan = this.planPage(pageNumber, layers, pageLogger);
			plans.push(plan);
			if (plan.targets.length === 0) {
				continue;
			}

			if (layers.content) {
				const scrubbed = this.scrubPage(layers.content, plan);
				plan.scrubbedGlyphs = scrubbed.count;
				writePageContent(page, scrubbed.content);
			}

			if (this.options.placeholder && !placeholderFont) {
				placeholderFont = await document.embedFont(StandardFonts.Helvetica);
			}
			this.paintTargets(page, plan.targets, placeholderFont);
		}

		const matchCount = plans.reduce((sum, plan) => sum + plan.targets.length + plan.failures, 0);
		const regionCount = plans.reduce(
			(sum, plan) => sum + plan.targets.reduce((runs, target) => runs + target.runs.length, 0),
			0
		);
		const failedMatchCount = plans.reduce((sum, plan) => sum + plan.failures, 0);
		const overlayOnlyCount = plans.reduce((sum, plan) => sum + plan.overlayOnly, 0);
		const scrubbedGlyphCount = plans.reduce((sum, plan) => sum + plan.scrubbedGlyphs, 0);
		const summary = {
			pageCount: pages.length,
			matchCount,
			regionCount,
			failedMatchCount,
			overlayOnlyCount,
			scrubbedGlyphCount,
			plans
		};

		if (regionCount === 0) {
			return {
				...summary,
				status: 'unchanged',
				bytes,
				message: matchCount === 0
					? 'No CPF found. Original PDF kept unchanged.'
					: `Found ${matchCount} CPF(s) but none could be placed. Original PDF kept unchanged.`
			};
		}

		const redactedBytes = await document.save();
		return {
			...summary,
			status: 'redacted',
			bytes: redactedBytes,
			message: `Applied ${regionCount} redaction box(es) over ${matchCount - failedMatchCount} CPF(s).`
		};
	}

	private async loadDocument(bytes: Uint8Array, fileName?: string): Promise<PDFDocument> {
		try {
			return await PDFDocument.load(bytes, { updateMetadata: false });
		} catch (error) {
			throw new UnreadableDocumentError(`Cannot open PDF: ${describeError(error)}`, fileName);
		}
	}

	private async loadSpans(bytes: Uint8Array, logger: Logger): Promise<PdfPageSpans[]> {
		try {
			return await extractPdfSpans(bytes, logger);
		} catch (error) {
			logger.warn('PDF.js text extraction failed; only the content stream layer is used.', {
				reason: describeError(error)
			});
			return [];
		}
	}

	private loadContentLayer(page: PDFPage, pageNumber: number, logger: Logger): ContentTextLayer | null {
		try {
			const fonts = createFontResolver(pageResources(page), logger);
			const layer = interpretContent(readPageContent(page, pageNumber), fonts);
			if (layer.unresolvedFontOperations > 0) {
				logger.debug('Text shown with an unknown font was skipped.', {
					operations: layer.unresolvedFontOperations
				});
			}
			return layer;
		} catch (error) {
			logger.warn('Content stream unreadable; falling back to PDF.js geometry.', { reason: describeError(error) });
			return null;
		}
	}

	private planMatches(
		matches: CpfMatch[],
		source: PageTextSource,
		geometry: GeometrySource,
		logger: Logger
	): { targets: RedactionTarget[]; failures: number } {
		const targets: RedactionTarget[] = [];
		let failures = 0;

		for (const match of matches) {
			try {
				targets.push({ match, source: geometry, runs: planRedaction(match, source, this.options.margin) });
			} catch (error) {
				if (!(error instanceof GeometryLookupError)) {
					throw error;
				}
				failures += 1;
				logger.warn('Skipping CPF without glyph geometry.', { reason: error.message, geometry });
			}
		}

		return { targets, failures };
	}

	/** Content stream matches first; a PDF.js match is kept only where no content run already covers it. */
	private planPage(pageNumber: number, layers: PageLayers, logger: Logger): PageRedactionPlan {
		const plan: PageRedactionPlan = { pageNumber, targets: [], failures: 0, overlayOnly: 0, scrubbedGlyphs: 0 };

		if (layers.content) {
			const matches = this.locator.findCpfs(layers.content.text);
			const planned = this.planMatches(matches, layers.content, 'content', logger);
			plan.targets.push(...planned.targets);
			plan.failures += planned.failures;
		}

		if (layers.spans) {
			const matches = this.locator.findCpfs(layers.spans.text);
			const planned = this.planMatches(matches, createSpanTextSource(layers.spans), 'spans', logger);
			const contentRuns = plan.targets.flatMap((target) => target.runs);

			for (const target of planned.targets) {
				const duplicate = target.runs.some((run) => contentRuns.some((existing) => rectsOverlap(run.rect, existing.rect)));
				if (duplicate) {
					continue;
				}
				plan.targets.push(target);
				plan.overlayOnly += 1;
				logger.warn('CPF found outside the page content stream; painted over without text removal.', {
					cpf: maskCpfDigits(target.match.rawText)
				});
			}
			plan.failures += planned.failures;
		}

		logger.debug('Page planned.', {
			targets: plan.targets.length,
			failures: plan.failures,
			overlayOnly: plan.overlayOnly
		});
		return plan;
	}

	private scrubPage(layer: ContentTextLayer, plan: PageRedactionPlan): { content: Uint8Array; count: number } {
		if (!this.options.scrubTextLayer) {
			return { content: layer.content, count: 0 };
		}

		const glyphIndex = new Map(layer.glyphs.map((glyph, index) => [glyph, index]));
		const removed = new Set<number>();

		for (const target of plan.targets) {
			if (target.source !== 'content') {
				continue;
			}
			for (const run of target.runs) {
				for (const digitIndex of run.digitIndices) {
					const position = target.match.digitPositions[digitIndex];
					const glyph = position ? layer.glyphAt(position.offset) : undefined;
					const index = glyph ? glyphIndex.get(glyph) : undefined;
					if (index !== undefined) {
						removed.add(index);
					}
				}
			}
		}

		return { content: scrubGlyphs(layer, removed), count: removed.size };
	}

	private paintTargets(page: PDFPage, targets: RedactionTarget[], placeholderFont?: PDFFont): void {
		const { fillColor, placeholder, placeholderColor } = this.options;

		for (const target of targets) {
			for (const run of target.runs) {
				const { width, height } = rectSize(run.rect);
				if (width <= 0 || height <= 0) {
					continue;
				}

				page.drawRectangle({
					x: run.rect.x0,
					y: run.rect.y0,
					width,
					height,
					color: toRgb(fillColor),
					borderWidth: 0
				});

				if (!placeholder || !placeholderFont) {
					continue;
				}
				for (const glyphRect of run.glyphRects) {
					const glyph = rectSize(glyphRect);
					const size = glyph.height * PLACEHOLDER_SCALE;
					const textWidth = placeholderFont.widthOfTextAtSize(placeholder, size);
					page.drawText(placeholder, {
						x: (glyphRect.x0 + glyphRect.x1 - textWidth) / 2,
						y: (glyphRect.y0 + glyphRect.y1 - size * PLACEHOLDER_SCALE) / 2,
						size,
						font: placeholderFont,
						color: toRgb(placeholderColor)
					});
				}
			}
		}
	}
}

export function createPdfRedactionEngine(config: PdfRedactionEngineConfig = {}): PdfRedactionEngine {
	return new PdfLibRedactionEngine(config);
}
