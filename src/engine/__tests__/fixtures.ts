import type { FontProfile, HeadingCandidate, TextSpan } from '../../types';

export const PAGE_HEIGHT = 792;

/** A span with body-text defaults; the box sits at `y0` and is as tall as the font. */
export const span = (text: string, overrides: Partial<Omit<TextSpan, 'text'>> & { y0?: number } = {}): TextSpan => {
    const { y0 = 400, ...rest } = overrides;
    const fontSize = rest.fontSize ?? 10;
    return {
        page: 0,
        text,
        fontSize,
        fontName: 'Helvetica',
        bold: false,
        italic: false,
        bbox: { x0: 72, y0, x1: 72 + text.length * fontSize * 0.5, y1: y0 + fontSize },
        pageHeight: PAGE_HEIGHT,
        ...rest
    };
};

/** A paragraph line long enough to count as body text. */
export const paragraph = (page: number, y0: number, fontSize = 10): TextSpan =>
    span('The committee reviewed every submission received during the period.', { page, y0, fontSize });

export const candidate = (text: string, overrides: Partial<Omit<HeadingCandidate, 'text'>> = {}): HeadingCandidate => ({
    text,
    page: 0,
    level: 'H1',
    score: 0.8,
    bbox: { x0: 72, y0: 100, x1: 300, y1: 116 },
    fontSize: 16,
    fontName: 'Helvetica-Bold',
    ...overrides
});

export const PROFILE: FontProfile = { bodySize: 10, tierSizes: [16, 13], maxSize: 16 };
