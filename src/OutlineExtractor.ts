/**
 * Outline Extractor - Main Entry Point
 *
 * This module provides the `OutlineExtractor` class, which reads a PDF, runs the heading
 * classification engine on its text layout and returns the document outline as JSON.
 *
 * **Usage:**
 * ```typescript
 * import { OutlineExtractor } from 'pdf-outline-extractor';
 *
 * // From a file path
 * const { outline } = await OutlineExtractor.extractOutline('report.pdf');
 *
 * // From a Buffer, with custom thresholds
 * const buffer = fs.readFileSync('report.pdf');
 * const result = await OutlineExtractor.extractOutline(buffer, { acceptanceThreshold: 0.5 });
 *
 * console.log(result.outline.title, result.outline.outline);
 * ```
 *
 * @module OutlineExtractor
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import { isResolvedConfig, resolveConfig, type OutlineExtractorConfig, type ResolvedConfig } from './config';
import { buildOutline } from './engine/OutlineBuilder';
import { assembleOutput } from './engine/OutputAssembler';
import { parsePdf } from './parsers/PdfParser';
import type { OutlineResult } from './types';
import { getOutlineError, getWrappedError, logWarning, OutlineErrorType } from './utils/errorUtils';
import { silentLogger } from './utils/logger';

/**
 * Per-call options that are not part of the shared configuration.
 */
export interface ExtractOptions {
    logger?: Logger;
    /** Aborts the run; it then rejects with the signal's reason. */
    signal?: AbortSignal;
    /**
     * File name of a Buffer input. Used to recognize placeholder metadata titles;
     * for a path input the path is used.
     */
    fileName?: string;
}

/**
 * Main class providing outline extraction.
 */
export class OutlineExtractor {
    /**
     * Extracts the title and heading outline of a PDF.
     *
     * This method:
     * 1. Accepts a file path, Buffer, or ArrayBuffer
     * 2. Extracts positioned text spans with pdfjs-dist
     * 3. Runs font statistics, filtering, scoring, hierarchy and title resolution
     * 4. Returns the JSON shape written by the batch runner
     *
     * A PDF without extractable text is not an error: the outline is empty and a warning
     * is returned alongside it.
     *
     * @param file - File path (string), Buffer, or ArrayBuffer containing the PDF
     * @param config - Raw configuration (validated here) or an already resolved one
     * @param options - Logger, abort signal, file name
     * @returns A promise resolving to the outline and any warnings
     * @throws {ParseError} If the file is missing, not a PDF, corrupted or encrypted
     * @throws {ConfigError} If the raw configuration is invalid
     *
     * @example
     * ```typescript
     * const { outline, warnings } = await OutlineExtractor.extractOutline('scan.pdf');
     * // outline => { title: '', outline: [] }, warnings => ['[PdfOutline]: scan.pdf has no extractable text; ...']
     * ```
     */
    public static async extractOutline(
        file: string | Buffer | ArrayBuffer,
        config: OutlineExtractorConfig | ResolvedConfig = {},
        options: ExtractOptions = {}
    ): Promise<OutlineResult> {
        const resolved = isResolvedConfig(config) ? config : resolveConfig(config);
        const logger = options.logger ?? silentLogger;

        let buffer: Buffer;
        let fileName = options.fileName;

        if (!file) {
            throw getOutlineError(OutlineErrorType.IMPROPER_ARGUMENTS);
        }

        if (file instanceof ArrayBuffer) {
            buffer = Buffer.from(file);
        } else if (Buffer.isBuffer(file)) {
            buffer = file;
        } else if (typeof file === 'string') {
            fileName = fileName ?? path.basename(file);
            if (!fs.existsSync(file)) {
                throw getOutlineError(OutlineErrorType.FILE_DOES_NOT_EXIST, file);
            }
            if (fs.lstatSync(file).isDirectory()) {
                throw getOutlineError(OutlineErrorType.LOCATION_NOT_FOUND, file);
            }
            try {
                buffer = await fs.promises.readFile(file);
            } catch (e) {
                throw getWrappedError(e, file);
            }
        } else {
            throw getOutlineError(OutlineErrorType.INVALID_INPUT);
        }

        const source = fileName ?? 'The document';
        const document = await parsePdf(buffer, resolved, { logger, signal: options.signal, source });
        options.signal?.throwIfAborted();

        const build = buildOutline(document, resolved, fileName);
        for (const warning of build.warnings) {
            logWarning(logger, warning);
        }

        logger.debug(
            {
                bodySize: build.profile.bodySize,
                tierSizes: build.profile.tierSizes,
                titleSource: build.titleSource,
                headings: build.outline.entries.length
            },
            'Outline built'
        );

        return {
            outline: assembleOutput(build.outline),
            warnings: build.warnings,
            pageCount: document.pageCount
        };
    }
}
