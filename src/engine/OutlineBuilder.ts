/**
 * Outline Builder
 *
 * The heading classification pipeline for one document, as a pure function of the
 * extracted spans and the configuration:
 *
 * 1. font statistics over every span;
 * 2. boilerplate detection over every page, then per-span filtering;
 * 3. pattern matching and scoring of the surviving spans;
 * 4. merging and ordering of the accepted candidates;
 * 5. title resolution, which removes the title from the entries.
 *
 * Same input, same output: no randomness, no clock, no shared state.
 *
 * @module OutlineBuilder
 */

import type { ResolvedConfig } from '../config';
import type { ExtractedDocument, FontProfile, Outline, TitleSource } from '../types';
import { getOutlineError, OutlineErrorType } from '../utils/errorUtils';
import { detectBoilerplate, filterCandidates } from './CandidateFilter';
import { computeFontProfile } from './FontStatistics';
import { isAccepted, scoreCandidates } from './HeadingScorer';
import { buildHierarchy, toEntries } from './HierarchyBuilder';
import { resolveTitle } from './TitleResolver';

export interface OutlineBuild {
    outline: Outline;
    titleSource: TitleSource;
    profile: FontProfile;
    /** Messages of soft errors, e.g. a document without text. */
    warnings: string[];
}

/**
 * Runs the classification pipeline on an extracted document.
 *
 * @param document - Spans, metadata title and page count from the Layout Extractor
 * @param config - Resolved configuration
 * @param fileName - Source file name, used to recognize placeholder metadata titles
 */
export function buildOutline(document: ExtractedDocument, config: ResolvedConfig, fileName?: string): OutlineBuild {
    const warnings: string[] = [];
    const { spans } = document;

    if (spans.length === 0) {
        warnings.push(getOutlineError(OutlineErrorType.NO_TEXT, fileName ?? 'The document').message);
    }

    const profile = computeFontProfile(spans, config);
    const analysedPages = Math.min(document.pageCount, config.maxPages);
    const boilerplate = detectBoilerplate(spans, analysedPages, config);
    const survivors = filterCandidates(spans, profile, boilerplate, config);

    const candidates = scoreCandidates(survivors, profile, config);
    const accepted = candidates.filter((candidate) => isAccepted(candidate, config));
    const ordered = buildHierarchy(accepted, config);

    const { title, source, entries } = resolveTitle(
        { metadataTitle: document.metadataTitle, fileName, entries: ordered, profile },
        config
    );

    return {
        outline: { title, entries: toEntries(entries) },
        titleSource: source,
        profile,
        warnings
    };
}
