/**
 * pdf-outline-extractor - PDF Title and Heading Outline Extraction
 *
 * Reads PDFs with pdfjs-dist and infers the document title and an H1-H3 outline from
 * font sizes, weight, numbering, capitalization and position. No embedded bookmarks are
 * needed; the result is best-effort.
 *
 * **Quick Start:**
 * ```typescript
 * import { OutlineExtractor } from 'pdf-outline-extractor';
 *
 * const { outline, warnings } = await OutlineExtractor.extractOutline('report.pdf');
 * // outline => { title: 'Annual Report', outline: [{ level: 'H1', text: '1. Introduction', page: 1 }, ...] }
 * ```
 *
 * **Main Exports:**
 * - `OutlineExtractor` - Main extractor class
 * - `buildOutline` - The pure classification engine over extracted text spans
 * - `processBatch` - Directory-to-directory batch runner
 * - `resolveConfig` - Configuration validation
 * - Error classes and all type definitions
 *
 * @packageDocumentation
 * @module pdf-outline-extractor
 */

import { OutlineExtractor } from './OutlineExtractor';

export { OutlineExtractor };
export type { ExtractOptions } from './OutlineExtractor';

/** Shorthand for {@link OutlineExtractor.extractOutline}. */
export const extractOutline = OutlineExtractor.extractOutline;

export {
    DEFAULT_CONFIG,
    DEFAULT_PLACEHOLDER_TITLE_PATTERNS,
    DEFAULT_SKIP_PATTERNS,
    SIGNAL_NAMES,
    isResolvedConfig,
    resolveConfig
} from './config';
export type { OutlineExtractorConfig, ResolvedConfig, SignalName, SignalWeights } from './config';

export { computeFontProfile, tierRank } from './engine/FontStatistics';
export { detectBoilerplate, filterCandidates, rejectionReason } from './engine/CandidateFilter';
export type { RejectionReason } from './engine/CandidateFilter';
export { matchPattern, patternDepth } from './engine/PatternMatcher';
export type { PatternFamily, PatternMatch } from './engine/PatternMatcher';
export { HEADING_SIGNALS, assignLevel, isAccepted, scoreCandidates, scoreSignals } from './engine/HeadingScorer';
export type { HeadingSignal, SignalContext } from './engine/HeadingScorer';
export { buildHierarchy, mergeAdjacent, toEntries } from './engine/HierarchyBuilder';
export { isPlaceholderTitle, resolveTitle } from './engine/TitleResolver';
export type { TitleInput, TitleResolution } from './engine/TitleResolver';
export { assembleOutput, serializeOutput } from './engine/OutputAssembler';
export { buildOutline } from './engine/OutlineBuilder';
export type { OutlineBuild } from './engine/OutlineBuilder';

export { parsePdf } from './parsers/PdfParser';
export type { PdfParseOptions } from './parsers/PdfParser';

export { processBatch } from './batch/BatchProcessor';
export type { BatchPaths, DocumentExtractor } from './batch/BatchProcessor';
export { runBatchCommand } from './batch/BatchCommand';

export {
    ConfigError,
    NoTextError,
    OutlineError,
    OutlineErrorType,
    ParseError,
    TimeoutError
} from './utils/errorUtils';
export { createLogger } from './utils/logger';
export type { LoggerOptions } from './utils/logger';

export type {
    BatchSummary,
    BoundingBox,
    DocumentFailure,
    DocumentReport,
    ExtractedDocument,
    FontProfile,
    HeadingCandidate,
    HeadingLevel,
    Outline,
    OutlineEntry,
    OutlineJson,
    OutlineJsonEntry,
    OutlineResult,
    TextSpan,
    TitleSource
} from './types';

export default OutlineExtractor;
