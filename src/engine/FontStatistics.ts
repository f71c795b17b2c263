/**
 * Font Statistics
 *
 * Builds the document's font profile: the body text size and up to three larger
 * "tier" sizes that map to H1-H3.
 *
 * Sizes are bucketed after rounding to whole points. The body size is the most frequent
 * bucket among those whose spans average at least `minBodyWords` words, which keeps short
 * decorative runs (labels, table cells) from outvoting real paragraphs of the same size.
 *
 * @module FontStatistics
 */

import type { ResolvedConfig } from '../config';
import type { FontProfile, TextSpan } from '../types';
import { countWords, roundFontSize } from '../utils/textUtils';

/** Number of heading tiers (H1, H2, H3). */
export const MAX_TIERS = 3;

interface SizeBucket {
    size: number;
    spans: number;
    words: number;
}

const bucketBySize = (spans: readonly TextSpan[]): SizeBucket[] => {
    const buckets = new Map<number, SizeBucket>();
    for (const span of spans) {
        const size = roundFontSize(span.fontSize);
        const bucket = buckets.get(size) ?? { size, spans: 0, words: 0 };
        bucket.spans += 1;
        bucket.words += countWords(span.text);
        buckets.set(size, bucket);
    }
    return [...buckets.values()];
};

/** Highest span count wins; ties go to the smaller size. */
const mostFrequent = (buckets: readonly SizeBucket[]): SizeBucket | undefined =>
    [...buckets].sort((a, b) => b.spans - a.spans || a.size - b.size)[0];

/**
 * Computes the font profile of a document.
 *
 * When no bucket reaches the word threshold the most frequent size overall is used,
 * so documents made only of short runs still get a baseline.
 */
export function computeFontProfile(spans: readonly TextSpan[], config: Pick<ResolvedConfig, 'minBodyWords'>): FontProfile {
    const buckets = bucketBySize(spans);
    if (buckets.length === 0) {
        return { bodySize: 0, tierSizes: [], maxSize: 0 };
    }

    const wordy = buckets.filter((bucket) => bucket.words / bucket.spans >= config.minBodyWords);
    const body = mostFrequent(wordy.length > 0 ? wordy : buckets);
    const bodySize = body ? body.size : 0;

    const larger = buckets
        .map((bucket) => bucket.size)
        .filter((size) => size > bodySize)
        .sort((a, b) => b - a);

    return {
        bodySize,
        tierSizes: larger.slice(0, MAX_TIERS),
        maxSize: Math.max(...buckets.map((bucket) => bucket.size))
    };
}

/**
 * Rank of a rounded size among the tiers: 0 for H1, 1 for H2, 2 for H3,
 * undefined when the size is not a tier.
 */
export function tierRank(size: number, profile: FontProfile): number | undefined {
    const rank = profile.tierSizes.indexOf(size);
    return rank === -1 ? undefined : rank;
}
