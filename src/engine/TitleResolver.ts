/**
 * Title Resolver
 *
 * Picks the document title:
 * 1. the metadata title, unless it is empty or a placeholder (the file name echoed into
 *    the info dictionary, "Untitled", "Microsoft Word - …");
 * 2. otherwise the best-scoring first-page entry in the document's largest font, after
 *    joining titles wrapped over several lines. Numbered lines ("1. Introduction") are
 *    section headings and never become the title;
 * 3. otherwise the empty string.
 *
 * The fallback only looks at accepted entries, so every line it joins into the title is
 * also one it can remove from the outline. Whatever the source, an entry with exactly the
 * title's text is removed as well.
 *
 * @module TitleResolver
 */

import * as path from 'path';
import type { ResolvedConfig } from '../config';
import type { BoundingBox, FontProfile, HeadingCandidate, TitleSource } from '../types';
import { normalizeWhitespace } from '../utils/textUtils';
import { compareByPosition, mergeAdjacent } from './HierarchyBuilder';

export type TitleConfig = Pick<ResolvedConfig, 'placeholderTitlePatterns' | 'mergeGapRatio'>;

export interface TitleInput {
    metadataTitle?: string;
    /** Source file name or path; its stem is compared with the metadata title. */
    fileName?: string;
    /** Ordered outline entries, built from the accepted candidates. */
    entries: readonly HeadingCandidate[];
    profile: FontProfile;
}

export interface TitleResolution {
    title: string;
    source: TitleSource;
    /** Entries with the title removed. */
    entries: HeadingCandidate[];
}

/**
 * True when a metadata title carries no information about the document.
 */
export function isPlaceholderTitle(title: string, fileName: string | undefined, config: Pick<ResolvedConfig, 'placeholderTitlePatterns'>): boolean {
    const normalized = normalizeWhitespace(title).toLowerCase();
    if (normalized.length === 0) return true;

    if (fileName) {
        const base = path.basename(fileName).toLowerCase();
        const stem = path.basename(base, path.extname(base));
        if (normalized === stem || normalized === base) return true;
    }

    return config.placeholderTitlePatterns.some((pattern) => pattern.test(normalized));
}

const containsBox = (outer: BoundingBox, inner: BoundingBox): boolean =>
    inner.x0 >= outer.x0 && inner.y0 >= outer.y0 && inner.x1 <= outer.x1 && inner.y1 <= outer.y1;

/**
 * Best unnumbered first-page entry in the document's largest font, or undefined.
 */
export function firstPageTitle(entries: readonly HeadingCandidate[], profile: FontProfile, config: Pick<ResolvedConfig, 'mergeGapRatio'>): HeadingCandidate | undefined {
    const pool = entries
        .filter((entry) => entry.page === 0 && entry.fontSize === profile.maxSize && entry.patternDepth === undefined)
        .sort(compareByPosition);

    let best: HeadingCandidate | undefined;
    for (const candidate of mergeAdjacent(pool, config)) {
        if (!best || candidate.score > best.score) best = candidate;
    }
    return best;
}

/**
 * True for an entry that is one of the lines joined into the first-page title.
 */
const isTitleLine = (entry: HeadingCandidate, title: HeadingCandidate): boolean =>
    entry.page === title.page
    && entry.fontSize === title.fontSize
    && entry.patternDepth === undefined
    && containsBox(title.bbox, entry.bbox);

export function resolveTitle(input: TitleInput, config: TitleConfig): TitleResolution {
    const metadataTitle = normalizeWhitespace(input.metadataTitle ?? '');

    let title = '';
    let source: TitleSource = 'none';
    let fallback: HeadingCandidate | undefined;
    if (metadataTitle && !isPlaceholderTitle(metadataTitle, input.fileName, config)) {
        title = metadataTitle;
        source = 'metadata';
    } else {
        fallback = firstPageTitle(input.entries, input.profile, config);
        if (fallback) {
            title = fallback.text;
            source = 'first-page';
        }
    }

    const entries = input.entries.filter((entry) => {
        if (title && normalizeWhitespace(entry.text) === title) return false;
        return !(fallback && isTitleLine(entry, fallback));
    });

    return { title, source, entries };
}
