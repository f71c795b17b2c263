/**
 * Candidate Filter
 *
 * Drops spans that are unlikely to be headings before any scoring happens.
 *
 * Header/footer detection needs the whole document, so filtering runs in two passes:
 * {@link detectBoilerplate} first collects where each normalized text occurs on every
 * page, then {@link filterCandidates} decides span by span.
 *
 * @module CandidateFilter
 */

import type { ResolvedConfig } from '../config';
import type { FontProfile, TextSpan } from '../types';
import { cleanHeadingText, repetitionSignature, roundFontSize } from '../utils/textUtils';
import { patternDepth } from './PatternMatcher';

export type RejectionReason = 'empty' | 'too-long' | 'boilerplate' | 'skip-pattern' | 'body-text';

interface Occurrence {
    page: number;
    /** Top edge as a fraction of the page height. */
    position: number;
}

/** Identity of a span inside the document's span list. */
const spanKey = (span: TextSpan): string => `${span.page}:${span.bbox.y0}:${span.bbox.x0}:${span.text}`;

const relativeTop = (span: TextSpan): number => (span.pageHeight > 0 ? span.bbox.y0 / span.pageHeight : 0);

/**
 * Finds running headers and footers: text that recurs identically (ignoring case and
 * spacing), at nearly the same vertical position, on more than `pageRatio` of the pages
 * and on at least `minPages` pages. Page labels are left to the skip patterns.
 *
 * @param pageCount - Number of analysed pages
 * @returns Keys of the spans to discard, for {@link filterCandidates}
 */
export function detectBoilerplate(
    spans: readonly TextSpan[],
    pageCount: number,
    config: Pick<ResolvedConfig, 'boilerplate'>
): Set<string> {
    const { pageRatio, minPages, positionTolerance } = config.boilerplate;
    const byText = new Map<string, { spans: TextSpan[]; occurrences: Occurrence[] }>();

    for (const span of spans) {
        const signature = repetitionSignature(span.text);
        if (!signature) continue;
        const group = byText.get(signature) ?? { spans: [], occurrences: [] };
        group.spans.push(span);
        group.occurrences.push({ page: span.page, position: relativeTop(span) });
        byText.set(signature, group);
    }

    const required = Math.max(minPages, Math.floor(pageCount * pageRatio) + 1);
    const boilerplate = new Set<string>();

    for (const group of byText.values()) {
        const pages = new Set(group.occurrences.map((o) => o.page));
        if (pages.size < required) continue;

        group.spans.forEach((span, index) => {
            const own = group.occurrences[index];
            const pagesNearby = new Set(
                group.occurrences
                    .filter((o) => Math.abs(o.position - own.position) <= positionTolerance)
                    .map((o) => o.page)
            );
            if (pagesNearby.size >= required) {
                boilerplate.add(spanKey(span));
            }
        });
    }

    return boilerplate;
}

/**
 * Reason a span is rejected, or undefined if it survives as a candidate.
 */
export function rejectionReason(
    span: TextSpan,
    profile: FontProfile,
    boilerplate: ReadonlySet<string>,
    config: Pick<ResolvedConfig, 'maxHeadingLength' | 'skipPatterns'>
): RejectionReason | undefined {
    const text = cleanHeadingText(span.text);
    if (text.length === 0) return 'empty';
    if (text.length > config.maxHeadingLength) return 'too-long';
    if (boilerplate.has(spanKey(span))) return 'boilerplate';
    if (config.skipPatterns.some((pattern) => pattern.test(text))) return 'skip-pattern';
    if (roundFontSize(span.fontSize) === profile.bodySize && !span.bold && patternDepth(text) === undefined) {
        return 'body-text';
    }
    return undefined;
}

/**
 * Keeps the spans that may be headings, in their original order.
 */
export function filterCandidates(
    spans: readonly TextSpan[],
    profile: FontProfile,
    boilerplate: ReadonlySet<string>,
    config: Pick<ResolvedConfig, 'maxHeadingLength' | 'skipPatterns'>
): TextSpan[] {
    return spans.filter((span) => rejectionReason(span, profile, boilerplate, config) === undefined);
}
