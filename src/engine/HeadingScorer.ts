/**
 * Heading Scorer
 *
 * Scores each candidate span with a weighted sum of independent signals and assigns a
 * tentative level.
 *
 * Signals live in {@link HEADING_SIGNALS}: a name and a measure normalized to [0, 1].
 * Their weights come from configuration, so tuning never touches control flow. The
 * length signal carries a negative weight and acts as a penalty.
 *
 * Level assignment:
 * - a numbering pattern decides the level (depth 1-3 → H1-H3), overriding the font tier;
 * - otherwise the font tier does (largest tier → H1);
 * - otherwise the candidate is H3, so uncertain text is never over-promoted.
 *
 * @module HeadingScorer
 */

import type { ResolvedConfig, SignalName } from '../config';
import type { FontProfile, HeadingCandidate, HeadingLevel, TextSpan } from '../types';
import { cleanHeadingText, roundFontSize, titleCaseRatio, uppercaseRatio } from '../utils/textUtils';
import { tierRank } from './FontStatistics';
import { MAX_DEPTH, patternDepth } from './PatternMatcher';

export type ScoringConfig = Pick<ResolvedConfig, 'weights' | 'topRegionRatio' | 'maxHeadingLength' | 'lengthPenaltyStart' | 'acceptanceThreshold'>;

/**
 * Facts about one candidate that the signal measures read.
 */
export interface SignalContext {
    span: TextSpan;
    text: string;
    fontSize: number;
    profile: FontProfile;
    patternDepth?: number;
    config: ScoringConfig;
}

export interface HeadingSignal {
    name: SignalName;
    measure: (context: SignalContext) => number;
}

/** Score of a size above body size that is not one of the top three tiers. */
const UNRANKED_LARGER_SIZE = 0.25;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

const fontTierMeasure = ({ fontSize, profile }: SignalContext): number => {
    if (fontSize <= profile.bodySize) return 0;
    const rank = tierRank(fontSize, profile);
    return rank === undefined ? UNRANKED_LARGER_SIZE : 1 - rank * 0.25;
};

export const HEADING_SIGNALS: readonly HeadingSignal[] = [
    { name: 'fontTier', measure: fontTierMeasure },
    { name: 'bold', measure: ({ span }) => (span.bold ? 1 : 0) },
    { name: 'capitalization', measure: ({ text }) => uppercaseRatio(text) },
    { name: 'titleCase', measure: ({ text }) => titleCaseRatio(text) },
    { name: 'pattern', measure: (context) => (context.patternDepth !== undefined ? 1 : 0) },
    {
        name: 'position',
        measure: ({ span, config }) =>
            span.pageHeight > 0 && span.bbox.y0 < span.pageHeight * config.topRegionRatio ? 1 : 0
    },
    {
        name: 'length',
        measure: ({ text, config }) =>
            clamp01((text.length - config.lengthPenaltyStart) / (config.maxHeadingLength - config.lengthPenaltyStart))
    }
];

const LEVELS: readonly HeadingLevel[] = ['H1', 'H2', 'H3'];

/** Maps a 1-based depth to a level, clamping anything deeper than H3. */
export const levelForDepth = (depth: number): HeadingLevel => LEVELS[Math.min(Math.max(depth, 1), MAX_DEPTH) - 1];

/**
 * Tentative level of a candidate: pattern depth first, then font tier, then H3.
 */
export function assignLevel(fontSize: number, profile: FontProfile, depth: number | undefined): HeadingLevel {
    if (depth !== undefined) return levelForDepth(depth);
    const rank = tierRank(fontSize, profile);
    if (rank !== undefined) return levelForDepth(rank + 1);
    return 'H3';
}

/**
 * Weighted sum of all signals for one candidate.
 */
export function scoreSignals(context: SignalContext): number {
    return HEADING_SIGNALS.reduce(
        (total, signal) => total + context.config.weights[signal.name] * signal.measure(context),
        0
    );
}

/**
 * Scores every candidate span. Candidates below the acceptance threshold are kept in the
 * result; use {@link isAccepted} to separate headings from the rest.
 */
export function scoreCandidates(spans: readonly TextSpan[], profile: FontProfile, config: ScoringConfig): HeadingCandidate[] {
    return spans.map((span) => {
        const text = cleanHeadingText(span.text);
        const fontSize = roundFontSize(span.fontSize);
        const depth = patternDepth(text);
        const score = scoreSignals({ span, text, fontSize, profile, patternDepth: depth, config });

        return {
            text,
            page: span.page,
            level: assignLevel(fontSize, profile, depth),
            score: Math.round(score * 1e6) / 1e6,
            bbox: { ...span.bbox },
            patternDepth: depth,
            fontSize,
            fontName: span.fontName
        };
    });
}

export const isAccepted = (candidate: HeadingCandidate, config: Pick<ResolvedConfig, 'acceptanceThreshold'>): boolean =>
    candidate.score >= config.acceptanceThreshold;
