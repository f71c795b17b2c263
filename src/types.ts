/**
 * Heading levels emitted in the outline.
 * Only three levels are supported; anything deeper is clamped to H3.
 */
export type HeadingLevel = 'H1' | 'H2' | 'H3';

/**
 * Axis-aligned box in top-down page coordinates (points).
 * `y0` is the top edge and grows downwards, like reading order.
 */
export interface BoundingBox {
    x0: number;
    y0: number;
    x1: number;
    y1: number;
}

/**
 * One contiguous run of text sharing font and style, as reported by layout extraction.
 */
export interface TextSpan {
    /** Zero-based page index. */
    page: number;
    text: string;
    /** Font size in points. Always > 0. */
    fontSize: number;
    /**
     * Font family name with any PDF subset prefix removed.
     * @example "Helvetica-Bold", "TimesNewRomanPSMT"
     */
    fontName: string;
    bold: boolean;
    italic: boolean;
    bbox: BoundingBox;
    pageHeight: number;
}

/**
 * Result of the Layout Extractor for one document.
 */
export interface ExtractedDocument {
    /** All spans of the analysed pages, in reading order. */
    spans: TextSpan[];
    /** Title from the PDF info dictionary, if any. */
    metadataTitle?: string;
    /** Total page count of the document, including pages beyond the analysis cap. */
    pageCount: number;
}

/**
 * Font statistics of a document.
 */
export interface FontProfile {
    /** Rounded font size of ordinary paragraph text. 0 when the document has no spans. */
    bodySize: number;
    /**
     * Up to three distinct rounded sizes strictly larger than `bodySize`, descending.
     * Index 0 maps to H1, 1 to H2, 2 to H3.
     */
    tierSizes: number[];
    /** Largest rounded size found anywhere in the document. */
    maxSize: number;
}

/**
 * A span (or merged group of spans) that survived filtering and received a heading score.
 */
export interface HeadingCandidate {
    /** Trimmed, whitespace-collapsed text. */
    text: string;
    page: number;
    level: HeadingLevel;
    score: number;
    bbox: BoundingBox;
    /** Nesting depth inferred from numbering syntax (1-3), if the text carried any. */
    patternDepth?: number;
    /** Rounded font size of the source span. */
    fontSize: number;
    fontName: string;
}

export interface OutlineEntry {
    level: HeadingLevel;
    text: string;
    /** Zero-based page index. */
    page: number;
}

/**
 * Title and headings of a document, in reading order.
 */
export interface Outline {
    title: string;
    entries: OutlineEntry[];
}

/**
 * Where a resolved title came from.
 * `none` means neither metadata nor the first page gave a usable title.
 */
export type TitleSource = 'metadata' | 'first-page' | 'none';

/**
 * The external JSON artifact written for each input PDF.
 */
export interface OutlineJson {
    title: string;
    outline: OutlineJsonEntry[];
}

export interface OutlineJsonEntry {
    level: HeadingLevel;
    text: string;
    /** One-based page number. */
    page: number;
}

/**
 * Result of extracting one document.
 */
export interface OutlineResult {
    outline: OutlineJson;
    /** Non-fatal problems met while processing, such as a PDF without extractable text. */
    warnings: string[];
    pageCount: number;
}

/**
 * Per-document success entry in a batch summary.
 */
export interface DocumentReport {
    file: string;
    output: string;
    headings: number;
    warnings: string[];
    elapsedMs: number;
}

/**
 * Per-document failure entry in a batch summary.
 */
export interface DocumentFailure {
    file: string;
    /** Error type from the taxonomy, e.g. `NOT_A_PDF` or `TIMEOUT`. */
    type: string;
    message: string;
}

export interface BatchSummary {
    succeeded: DocumentReport[];
    failed: DocumentFailure[];
    elapsedMs: number;
}
