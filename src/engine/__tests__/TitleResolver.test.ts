import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../config';
import type { FontProfile } from '../../types';
import { isPlaceholderTitle, resolveTitle } from '../TitleResolver';
import { candidate } from './fixtures';

const profile: FontProfile = { bodySize: 10, tierSizes: [24, 16], maxSize: 24 };

const titleLine = candidate('Quarterly Report', {
    fontSize: 24,
    score: 0.6,
    bbox: { x0: 72, y0: 80, x1: 400, y1: 104 }
});
const introduction = candidate('1. Introduction', {
    patternDepth: 1,
    bbox: { x0: 72, y0: 200, x1: 260, y1: 216 }
});

describe('isPlaceholderTitle', () => {
    it('recognizes the file name echoed as a title', () => {
        expect(isPlaceholderTitle('report.pdf', 'report.pdf', DEFAULT_CONFIG)).toBe(true);
        expect(isPlaceholderTitle('Report', '/data/in/report.pdf', DEFAULT_CONFIG)).toBe(true);
    });

    it('recognizes generic producer titles', () => {
        expect(isPlaceholderTitle('Untitled', undefined, DEFAULT_CONFIG)).toBe(true);
        expect(isPlaceholderTitle('Microsoft Word - draft.docx', undefined, DEFAULT_CONFIG)).toBe(true);
        expect(isPlaceholderTitle('Document1', undefined, DEFAULT_CONFIG)).toBe(true);
        expect(isPlaceholderTitle('   ', undefined, DEFAULT_CONFIG)).toBe(true);
    });

    it('accepts a descriptive title', () => {
        expect(isPlaceholderTitle('Annual Report 2024', 'report.pdf', DEFAULT_CONFIG)).toBe(false);
    });
});

describe('resolveTitle', () => {
    it('falls back to the largest first-page line when metadata repeats the file name', () => {
        const resolution = resolveTitle(
            {
                metadataTitle: 'report.pdf',
                fileName: 'report.pdf',
                entries: [titleLine, introduction],
                profile
            },
            DEFAULT_CONFIG
        );

        expect(resolution.title).toBe('Quarterly Report');
        expect(resolution.source).toBe('first-page');
        expect(resolution.entries.map((e) => e.text)).toEqual(['1. Introduction']);
    });

    it('prefers a usable metadata title and removes it from the entries', () => {
        const resolution = resolveTitle(
            {
                metadataTitle: '  Quarterly   Report ',
                fileName: 'q3.pdf',
                entries: [titleLine, introduction],
                profile
            },
            DEFAULT_CONFIG
        );

        expect(resolution).toEqual({
            title: 'Quarterly Report',
            source: 'metadata',
            entries: [introduction]
        });
    });

    it('joins a title wrapped over two lines and removes both lines from the entries', () => {
        const secondLine = candidate('of the Harbour Board', {
            fontSize: 24,
            score: 0.5,
            bbox: { x0: 72, y0: 108, x1: 380, y1: 132 }
        });

        const resolution = resolveTitle({ entries: [titleLine, secondLine, introduction], profile }, DEFAULT_CONFIG);

        expect(resolution.title).toBe('Quarterly Report of the Harbour Board');
        expect(resolution.entries).toEqual([introduction]);
    });

    it('never takes a numbered line as the title', () => {
        const numbered = candidate('1. Introduction', {
            fontSize: 24,
            patternDepth: 1,
            bbox: { x0: 72, y0: 80, x1: 300, y1: 104 }
        });

        const resolution = resolveTitle({ entries: [numbered], profile }, DEFAULT_CONFIG);

        expect(resolution).toEqual({ title: '', source: 'none', entries: [numbered] });
    });

    it('returns an empty title when nothing qualifies', () => {
        const laterPage = candidate('Appendix', { page: 2, fontSize: 24 });

        const resolution = resolveTitle(
            { metadataTitle: 'Untitled', entries: [laterPage, introduction], profile },
            DEFAULT_CONFIG
        );

        expect(resolution).toEqual({ title: '', source: 'none', entries: [laterPage, introduction] });
    });
});
