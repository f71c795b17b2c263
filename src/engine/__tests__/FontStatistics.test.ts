import { describe, expect, it } from 'vitest';
import { computeFontProfile, tierRank } from '../FontStatistics';
import { paragraph, span } from './fixtures';

const config = { minBodyWords: 5 };

describe('computeFontProfile', () => {
    it('takes the body size from wordy spans, not from frequent short labels', () => {
        const spans = [
            paragraph(0, 200),
            paragraph(0, 220),
            paragraph(1, 200),
            ...Array.from({ length: 5 }, (_, i) => span('Label', { fontSize: 9, y0: 500 + i * 12 })),
            span('Annual Report', { fontSize: 18 }),
            span('Findings', { fontSize: 14 }),
            span('Details', { fontSize: 12 }),
            span('Notes', { fontSize: 11 })
        ];

        expect(computeFontProfile(spans, config)).toEqual({
            bodySize: 10,
            tierSizes: [18, 14, 12],
            maxSize: 18
        });
    });

    it('buckets sizes after rounding', () => {
        const spans = [paragraph(0, 100, 10.4), paragraph(0, 120, 9.6), span('Heading', { fontSize: 15.6 })];

        expect(computeFontProfile(spans, config)).toEqual({ bodySize: 10, tierSizes: [16], maxSize: 16 });
    });

    it('falls back to the most frequent size when no size is wordy', () => {
        const spans = [span('A', { fontSize: 12 }), span('B', { fontSize: 12 }), span('Title', { fontSize: 20 })];

        expect(computeFontProfile(spans, config)).toEqual({ bodySize: 12, tierSizes: [20], maxSize: 20 });
    });

    it('breaks ties in favour of the smaller size', () => {
        const spans = [paragraph(0, 100, 10), paragraph(0, 120, 10), paragraph(0, 140, 11), paragraph(0, 160, 11)];

        expect(computeFontProfile(spans, config)).toEqual({ bodySize: 10, tierSizes: [11], maxSize: 11 });
    });

    it('returns an empty profile for a document without spans', () => {
        expect(computeFontProfile([], config)).toEqual({ bodySize: 0, tierSizes: [], maxSize: 0 });
    });
});

describe('tierRank', () => {
    const profile = { bodySize: 10, tierSizes: [18, 14, 12], maxSize: 18 };

    it('ranks tier sizes from the largest', () => {
        expect(tierRank(18, profile)).toBe(0);
        expect(tierRank(14, profile)).toBe(1);
        expect(tierRank(12, profile)).toBe(2);
    });

    it('returns undefined for sizes outside the tiers', () => {
        expect(tierRank(11, profile)).toBeUndefined();
        expect(tierRank(10, profile)).toBeUndefined();
    });
});
