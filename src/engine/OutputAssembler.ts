/**
 * Output Assembler
 *
 * Maps an {@link Outline} to the JSON artifact. Pages become 1-based; nothing is
 * reordered, deduplicated or filtered here.
 *
 * @module OutputAssembler
 */

import type { Outline, OutlineJson } from '../types';

export const assembleOutput = (outline: Outline): OutlineJson => ({
    title: outline.title,
    outline: outline.entries.map((entry) => ({
        level: entry.level,
        text: entry.text,
        page: entry.page + 1
    }))
});

/** Serialized form written to disk: two-space indentation, trailing newline. */
export const serializeOutput = (output: OutlineJson): string => `${JSON.stringify(output, null, 2)}\n`;
