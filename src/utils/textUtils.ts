/**
 * Text helpers shared by the engine components.
 *
 * @module textUtils
 */

/** Collapses runs of whitespace into single spaces and trims. */
export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

/**
 * Normalizes heading text: collapsed whitespace, no leading bullet glyphs or leader dots.
 * @example cleanHeadingText('•  Key   Results') === 'Key Results'
 */
export const cleanHeadingText = (text: string): string =>
    normalizeWhitespace(text)
        .replace(/^[•▪●◦\-*+]\s*/, '')
        .replace(/^\.+\s*/, '');

/**
 * Lower-cased, whitespace-collapsed signature used to spot text repeated across pages.
 * Numbers are kept: "Chapter 2" and "Chapter 3" are different texts.
 */
export const repetitionSignature = (text: string): string => normalizeWhitespace(text.toLowerCase());

export const countWords = (text: string): number => {
    const trimmed = text.trim();
    return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
};

/** Font sizes are compared after rounding to whole points. */
export const roundFontSize = (size: number): number => Math.round(size);

/**
 * Fraction of letters that are upper case. 0 for text without letters.
 */
export const uppercaseRatio = (text: string): number => {
    const letters = text.match(/\p{L}/gu);
    if (!letters) return 0;
    const upper = letters.filter((ch) => ch !== ch.toLowerCase());
    return upper.length / letters.length;
};

/**
 * Fraction of words (those starting with a letter) whose first letter is upper case.
 */
export const titleCaseRatio = (text: string): number => {
    const words = text.split(/\s+/).filter((word) => /^\p{L}/u.test(word));
    if (words.length === 0) return 0;
    const capitalized = words.filter((word) => word[0] !== word[0].toLowerCase());
    return capitalized.length / words.length;
};
