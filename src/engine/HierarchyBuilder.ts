/**
 * Hierarchy Builder
 *
 * Turns accepted candidates into ordered outline entries:
 * - orders candidates by page, then top edge, then left edge;
 * - joins headings wrapped over several lines (same page, same font and level, small
 *   vertical gap, continuation line without its own numbering);
 * - drops repeats of an entry already seen on the same page.
 *
 * Levels arrive already clamped to H1-H3 by the scorer.
 *
 * Levels are not forced to nest: an H2 before any H1 (a preface, a front-matter block)
 * stays as it is, and no intermediate levels are invented.
 *
 * @module HierarchyBuilder
 */

import type { ResolvedConfig } from '../config';
import type { BoundingBox, HeadingCandidate, OutlineEntry } from '../types';
import { normalizeWhitespace } from '../utils/textUtils';

/** Overlap allowed between two merged lines, as a fraction of the font size. */
const SAME_LINE_TOLERANCE = 0.5;

export const compareByPosition = (a: HeadingCandidate, b: HeadingCandidate): number =>
    a.page - b.page || a.bbox.y0 - b.bbox.y0 || a.bbox.x0 - b.bbox.x0;

const unionBox = (a: BoundingBox, b: BoundingBox): BoundingBox => ({
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1)
});

/**
 * True if `next` continues the heading `previous` on the following line.
 */
export function continuesHeading(previous: HeadingCandidate, next: HeadingCandidate, config: Pick<ResolvedConfig, 'mergeGapRatio'>): boolean {
    if (previous.page !== next.page) return false;
    if (previous.level !== next.level) return false;
    if (previous.fontSize !== next.fontSize || previous.fontName !== next.fontName) return false;
    if (next.patternDepth !== undefined) return false;

    const gap = next.bbox.y0 - previous.bbox.y1;
    return gap >= -previous.fontSize * SAME_LINE_TOLERANCE && gap <= previous.fontSize * config.mergeGapRatio;
}

/**
 * Joins wrapped multi-line headings. Input must already be in reading order.
 */
export function mergeAdjacent(candidates: readonly HeadingCandidate[], config: Pick<ResolvedConfig, 'mergeGapRatio'>): HeadingCandidate[] {
    const merged: HeadingCandidate[] = [];
    for (const candidate of candidates) {
        const previous = merged[merged.length - 1];
        if (previous && continuesHeading(previous, candidate, config)) {
            merged[merged.length - 1] = {
                ...previous,
                text: normalizeWhitespace(`${previous.text} ${candidate.text}`),
                bbox: unionBox(previous.bbox, candidate.bbox),
                score: Math.max(previous.score, candidate.score)
            };
        } else {
            merged.push({ ...candidate });
        }
    }
    return merged;
}

/**
 * Builds the ordered outline entries from accepted candidates.
 */
export function buildHierarchy(candidates: readonly HeadingCandidate[], config: Pick<ResolvedConfig, 'mergeGapRatio'>): HeadingCandidate[] {
    const ordered = [...candidates].sort(compareByPosition);
    const seen = new Set<string>();
    const result: HeadingCandidate[] = [];

    for (const candidate of mergeAdjacent(ordered, config)) {
        const text = normalizeWhitespace(candidate.text);
        if (text.length === 0) continue;
        const key = `${candidate.page}\u0000${text}`;
        if (seen.has(key)) continue;
        seen.add(key);
        result.push({ ...candidate, text });
    }

    return result;
}

export const toEntries = (candidates: readonly HeadingCandidate[]): OutlineEntry[] =>
    candidates.map(({ level, text, page }) => ({ level, text, page }));
