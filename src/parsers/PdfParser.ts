/**
 * PDF Parser
 *
 * Layout extraction with PDF.js (pdfjs-dist): turns a PDF into positioned text spans with
 * font facts, plus the metadata title and the page count.
 *
 * **What a span carries:**
 * - text, font family (subset prefix removed), size, bold/italic flags;
 * - a bounding box in top-down page coordinates, and the page height.
 *
 * **PDF limitations that matter here:**
 *
 * - **Styles**: PDF has no "Heading 1" style, only visual properties. Bold and italic come
 *   from the embedded font's flags, or failing that from its name ("Arial-BoldMT").
 *
 * - **Words and lines**: text is drawn in arbitrary chunks (glyph runs, words, lines).
 *   Chunks sharing a baseline and a font are joined, and spaces are restored from the gaps.
 *
 * - **Scanned pages**: an image of text has no text layer; such pages yield no spans.
 *
 * **Parsing Approach:**
 * 1. Sniff the magic bytes; refuse anything that is not a PDF.
 * 2. Load the document with pdfjs-dist and read the info dictionary.
 * 3. For each page up to `maxPages`:
 *    a. build the operator list so the page's fonts are resolved;
 *    b. collect text items with position and font;
 *    c. sort top to bottom, then left to right;
 *    d. join chunks of the same line and font into spans.
 *
 * @module PdfParser
 * @see https://mozilla.github.io/pdf.js/ PDF.js documentation
 */

import * as fileType from 'file-type';
import type { Logger } from 'pino';
import type {
    PDFDocumentLoadingTask,
    TextItem,
    TextMarkedContent
} from 'pdfjs-dist/types/src/display/api';
import { pathToFileURL } from 'url';
import type { ResolvedConfig } from '../config';
import type { ExtractedDocument, TextSpan } from '../types';
import { getOutlineError, getWrappedError, logWarning, OutlineErrorType } from '../utils/errorUtils';
import { silentLogger } from '../utils/logger';
import { roundFontSize } from '../utils/textUtils';

type PdfJs = typeof import('pdfjs-dist');

/** Options for a single extraction run. */
export interface PdfParseOptions {
    logger?: Logger;
    /** Aborts the extraction; the loading task is destroyed and the run rejects. */
    signal?: AbortSignal;
    /** File name or label used in messages. */
    source?: string;
}

/** A text chunk as drawn, before line joining. */
export interface TextFragment {
    text: string;
    x0: number;
    x1: number;
    /** Baseline, measured from the top of the page. */
    baseline: number;
    fontSize: number;
    fontName: string;
    bold: boolean;
    italic: boolean;
}

/** Font facts exported by PDF.js for a loaded font. */
export interface LoadedFont {
    name?: string;
    bold?: boolean;
    black?: boolean;
    italic?: boolean;
}

/**
 * The parts of a PDF.js page that span extraction reads.
 * `PDFPageProxy` satisfies it.
 */
export interface PageSource {
    readonly view: number[];
    readonly commonObjs: unknown;
    getOperatorList(): Promise<unknown>;
    getTextContent(): Promise<{ items: Array<TextItem | TextMarkedContent> }>;
    cleanup(): unknown;
}

/**
 * The parts of a PDF.js document that extraction reads.
 * `PDFDocumentProxy` satisfies it.
 */
export interface DocumentSource {
    readonly numPages: number;
    getMetadata(): Promise<{ info: unknown }>;
    getPage(pageNumber: number): Promise<PageSource>;
}

interface ObjectStore {
    has(objId: string): boolean;
    get(objId: string): unknown;
}

/** Chunks whose baselines differ by no more than this (points) share a line. */
const BASELINE_TOLERANCE = 2;
/** Largest horizontal gap, in ems, between chunks joined into one span. */
const MAX_JOIN_GAP = 1.0;
/** Gap, in ems, above which a space is restored between joined chunks. */
const SPACE_GAP = 0.15;

const BOLD_NAME = /bold|black|heavy|semibold|demi/i;
const ITALIC_NAME = /italic|oblique/i;

/**
 * File types accepted as PDF. Adobe Illustrator files are PDF-compatible and file-type
 * reports them separately.
 */
const PDF_EXTENSIONS = new Set(['pdf', 'ai']);

let pdfjsModule: Promise<PdfJs> | undefined;

/** The part of the pdfjs module that holds the worker location. */
export interface WorkerOptionsHost {
    GlobalWorkerOptions: { workerSrc: string };
}

/**
 * Loads the legacy build of pdfjs-dist, the one meant for Node.js.
 *
 * The import goes through `Function` so that compiling to CommonJS doesn't turn it into a
 * `require()` of an ES module.
 */
const loadPdfJs = (): Promise<PdfJs> => {
    if (!pdfjsModule) {
        const dynamicImport = new Function('specifier', 'return import(specifier)');
        pdfjsModule = (async () => {
            const pdfjs: PdfJs = await dynamicImport('pdfjs-dist/legacy/build/pdf.mjs');
            return pdfjs;
        })().catch((e: unknown) => {
            pdfjsModule = undefined;
            throw e;
        });
    }
    return pdfjsModule;
};

/**
 * Points pdfjs at the worker for this run. The module is shared by every run in the
 * process, so this happens before each `getDocument` call.
 */
export const configureWorker = (pdfjs: WorkerOptionsHost, config: Pick<ResolvedConfig, 'pdfWorkerSrc'>): void => {
    pdfjs.GlobalWorkerOptions.workerSrc = config.pdfWorkerSrc
        ?? pathToFileURL(require.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs')).href;
};

const isTextItem = (item: TextItem | TextMarkedContent): item is TextItem => 'str' in item;

const isObjectStore = (value: unknown): value is ObjectStore =>
    typeof value === 'object' && value !== null
    && 'has' in value && typeof value.has === 'function'
    && 'get' in value && typeof value.get === 'function';

const isLoadedFont = (value: unknown): value is LoadedFont =>
    typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string';

/** Removes the PDF subset prefix (6 uppercase letters + '+'). */
export const stripSubsetPrefix = (fontName: string): string => fontName.replace(/^[A-Z]{6}\+/, '');

/**
 * Resolves the embedded font behind a text item's internal font id.
 * Fonts reach `commonObjs` once the page's operator list has been built.
 */
const lookupFont = (page: PageSource, fontId: string): LoadedFont | undefined => {
    const store: unknown = page.commonObjs;
    if (!isObjectStore(store) || !store.has(fontId)) return undefined;
    try {
        const data = store.get(fontId);
        return isLoadedFont(data) ? data : undefined;
    } catch {
        // Not resolved yet: fall back to the item's font id
        return undefined;
    }
};

/**
 * Font facts for a text item: family name, bold and italic.
 */
export const describeFont = (fontId: string, font: LoadedFont | undefined): Pick<TextFragment, 'fontName' | 'bold' | 'italic'> => {
    const fontName = font?.name ? stripSubsetPrefix(font.name) : fontId;
    return {
        fontName,
        bold: Boolean(font?.bold || font?.black) || BOLD_NAME.test(fontName),
        italic: Boolean(font?.italic) || ITALIC_NAME.test(fontName)
    };
};

/**
 * Sort: top to bottom, then left to right within a line.
 */
const compareFragments = (a: TextFragment, b: TextFragment): number => {
    if (Math.abs(a.baseline - b.baseline) > BASELINE_TOLERANCE) return a.baseline - b.baseline;
    return a.x0 - b.x0;
};

const sameStyle = (a: TextFragment, b: TextFragment): boolean =>
    a.fontName === b.fontName
    && roundFontSize(a.fontSize) === roundFontSize(b.fontSize)
    && a.bold === b.bold
    && a.italic === b.italic;

/**
 * Joins fragments of the same line and style into spans.
 *
 * @param fragments - Fragments of one page, sorted
 * @param page - Zero-based page index
 * @param pageHeight - Page height in points
 */
export const joinFragments = (fragments: readonly TextFragment[], page: number, pageHeight: number): TextSpan[] => {
    const joined: TextFragment[] = [];

    for (const fragment of fragments) {
        const current = joined[joined.length - 1];
        const gap = current ? fragment.x0 - current.x1 : 0;
        const joinable = current
            && Math.abs(fragment.baseline - current.baseline) <= BASELINE_TOLERANCE
            && sameStyle(current, fragment)
            && gap >= -current.fontSize * 0.5
            && gap <= current.fontSize * MAX_JOIN_GAP;

        if (current && joinable) {
            const needsSpace = gap > current.fontSize * SPACE_GAP
                && !current.text.endsWith(' ')
                && !fragment.text.startsWith(' ');
            current.text += (needsSpace ? ' ' : '') + fragment.text;
            current.x1 = Math.max(current.x1, fragment.x1);
        } else {
            joined.push({ ...fragment });
        }
    }

    return joined
        .map((fragment) => ({
            page,
            text: fragment.text.replace(/\s+/g, ' ').trim(),
            fontSize: fragment.fontSize,
            fontName: fragment.fontName,
            bold: fragment.bold,
            italic: fragment.italic,
            bbox: {
                x0: fragment.x0,
                y0: fragment.baseline - fragment.fontSize,
                x1: fragment.x1,
                y1: fragment.baseline
            },
            pageHeight
        }))
        .filter((span) => span.text.length > 0);
};

/**
 * Extracts the spans of one page.
 */
export const extractPageSpans = async (page: PageSource, pageIndex: number): Promise<TextSpan[]> => {
    const [viewLeft, , , viewTop] = page.view;
    const pageHeight = Math.abs(page.view[3] - page.view[1]);

    await page.getOperatorList();
    const textContent = await page.getTextContent();

    const fragments: TextFragment[] = [];
    for (const item of textContent.items) {
        if (!isTextItem(item) || item.str.trim().length === 0) continue;

        const transform = item.transform;
        const fontSize = item.height || Math.abs(transform[3]);
        if (!(fontSize > 0)) continue;

        const x0 = transform[4] - viewLeft;
        fragments.push({
            text: item.str,
            x0,
            x1: x0 + (item.width || 0),
            baseline: viewTop - transform[5],
            fontSize,
            ...describeFont(item.fontName, lookupFont(page, item.fontName))
        });
    }

    fragments.sort(compareFragments);
    return joinFragments(fragments, pageIndex, pageHeight);
};

const readMetadataTitle = async (pdfDocument: Pick<DocumentSource, 'getMetadata'>, logger: Logger): Promise<string | undefined> => {
    try {
        const meta = await pdfDocument.getMetadata();
        const info: unknown = meta.info;
        if (typeof info === 'object' && info !== null && 'Title' in info && typeof info.Title === 'string') {
            return info.Title;
        }
    } catch (e) {
        logWarning(logger, 'Could not read the document info dictionary', e);
    }
    return undefined;
};

/**
 * Reads the metadata title and the spans of the first `maxPages` pages of an open document.
 * A page that fails to load is logged and skipped.
 */
export const readDocument = async (
    pdfDocument: DocumentSource,
    config: Pick<ResolvedConfig, 'maxPages'>,
    options: Pick<PdfParseOptions, 'logger' | 'signal'> = {}
): Promise<ExtractedDocument> => {
    const { logger = silentLogger, signal } = options;
    const pageCount = pdfDocument.numPages;
    const metadataTitle = await readMetadataTitle(pdfDocument, logger);
    const spans: TextSpan[] = [];

    for (let i = 1; i <= Math.min(pageCount, config.maxPages); i++) {
        signal?.throwIfAborted();
        try {
            const page = await pdfDocument.getPage(i);
            spans.push(...await extractPageSpans(page, i - 1));
            page.cleanup();
        } catch (e) {
            signal?.throwIfAborted();
            logWarning(logger, `Error loading page ${i}`, e);
        }
    }

    return { spans, metadataTitle, pageCount };
};

/**
 * Rejects with a ParseError unless the buffer holds a PDF.
 */
export const assertPdf = async (buffer: Buffer, source: string): Promise<void> => {
    const type = await fileType.fromBuffer(buffer);
    if (!type || !PDF_EXTENSIONS.has(type.ext)) {
        throw getOutlineError(OutlineErrorType.NOT_A_PDF, source);
    }
};

/**
 * Parses a PDF file and extracts its text spans.
 *
 * @param buffer - The PDF file buffer
 * @param config - Resolved configuration (`maxPages`, `pdfWorkerSrc`)
 * @param options - Logger, abort signal and source label
 * @returns Spans of the first `maxPages` pages, metadata title and real page count
 * @throws {ParseError} If the buffer is not a PDF, or is corrupted or encrypted
 */
export const parsePdf = async (
    buffer: Buffer,
    config: Pick<ResolvedConfig, 'maxPages' | 'pdfWorkerSrc'>,
    options: PdfParseOptions = {}
): Promise<ExtractedDocument> => {
    const { logger = silentLogger, signal, source = 'The document' } = options;

    signal?.throwIfAborted();
    await assertPdf(buffer, source);

    const pdfjs = await loadPdfJs();
    signal?.throwIfAborted();
    configureWorker(pdfjs, config);

    const loadingTask: PDFDocumentLoadingTask = pdfjs.getDocument({
        data: new Uint8Array(buffer),
        verbosity: 0, // ERRORS only, suppresses warnings
        isEvalSupported: false
    });

    const onAbort = (): void => {
        loadingTask.destroy().catch((e: unknown) => logWarning(logger, 'Failed to release the PDF document', e));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
        let pdfDocument: DocumentSource;
        try {
            pdfDocument = await loadingTask.promise;
        } catch (e) {
            signal?.throwIfAborted();
            throw getWrappedError(e, source);
        }

        return await readDocument(pdfDocument, config, { logger, signal });
    } finally {
        signal?.removeEventListener('abort', onAbort);
        if (!signal?.aborted) {
            await loadingTask.destroy();
        }
    }
};
