/**
 * Pattern Matcher
 *
 * Recognizes numbering, lettering and keyword prefixes at the start of a line and infers
 * a nesting depth from them, independently of the font.
 *
 * Families are tried in order and the first match wins:
 * 1. decimal numbering (`2`, `2.1`, `2.1.3` followed by text) → one level per numeric group
 * 2. roman numerals (`IV.`) → 1
 * 3. single capital letters (`B.`) → 1
 * 4. keywords (`Chapter 3`, `Section 2`, `Part II`, `Appendix A`) → 1
 *
 * Roman and letter forms are case-sensitive so that sentence-initial words don't match;
 * keywords are not.
 *
 * @module PatternMatcher
 */

/** Deepest level the outline supports. */
export const MAX_DEPTH = 3;

/** Section numbers above this are treated as quantities or years, not numbering. */
const MAX_SECTION_NUMBER = 99;

export type PatternFamily = 'decimal' | 'roman' | 'letter' | 'keyword';

export interface PatternMatch {
    family: PatternFamily;
    /** Nesting depth, clamped to 1-3. */
    depth: number;
    /** The matched prefix, e.g. "2.1" or "Chapter 3". */
    label: string;
}

interface PatternRule {
    family: PatternFamily;
    pattern: RegExp;
    depth: (match: RegExpExecArray) => number | undefined;
}

const PATTERN_RULES: readonly PatternRule[] = [
    {
        family: 'decimal',
        pattern: /^(\d{1,2}(?:\.\d{1,3})*)\.?\s+\S/,
        depth: (match) => {
            const groups = match[1].split('.');
            const top = Number.parseInt(groups[0], 10);
            return top >= 1 && top <= MAX_SECTION_NUMBER ? groups.length : undefined;
        }
    },
    {
        family: 'roman',
        pattern: /^(M{0,3}(?:CM|CD|D?C{0,3})(?:XC|XL|L?X{0,3})(?:IX|IV|V?I{0,3}))\.\s+\S/,
        depth: (match) => (match[1].length > 0 ? 1 : undefined)
    },
    {
        family: 'letter',
        pattern: /^([A-Z])\.\s+\S/,
        depth: () => 1
    },
    {
        family: 'keyword',
        pattern: /^((?:chapter|section|part|appendix)\s+(?:\d+|[IVXLC]+|[A-Z])\b)/i,
        depth: () => 1
    }
];

/**
 * Matches trimmed text against the pattern families.
 *
 * @returns The first matching family with its depth, or undefined
 */
export function matchPattern(text: string): PatternMatch | undefined {
    const trimmed = text.trim();
    for (const rule of PATTERN_RULES) {
        const match = rule.pattern.exec(trimmed);
        if (!match) continue;
        const depth = rule.depth(match);
        if (depth === undefined) continue;
        return {
            family: rule.family,
            depth: Math.min(Math.max(depth, 1), MAX_DEPTH),
            label: match[1]
        };
    }
    return undefined;
}

/** Depth hint only; undefined when no family matches. */
export const patternDepth = (text: string): number | undefined => matchPattern(text)?.depth;
