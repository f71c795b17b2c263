/**
 * Batch Processor
 *
 * Maps a directory of PDFs to a directory of outline JSON files, one per input,
 * named after the input's stem. A document that fails is recorded and skipped;
 * it never leaves an output file behind and never stops the batch.
 *
 * @module BatchProcessor
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import type { ResolvedConfig } from '../config';
import { serializeOutput } from '../engine/OutputAssembler';
import { OutlineExtractor, type ExtractOptions } from '../OutlineExtractor';
import type { BatchSummary, DocumentFailure, DocumentReport, OutlineResult } from '../types';
import { getOutlineError, getWrappedError, logWarning, OutlineErrorType } from '../utils/errorUtils';
import { withTimeout } from '../utils/timeoutUtils';
import { runPool } from './workerPool';

export interface BatchPaths {
    inputDir: string;
    outputDir: string;
}

/** Extraction step of the batch; `OutlineExtractor.extractOutline` unless replaced. */
export type DocumentExtractor = (file: string, config: ResolvedConfig, options: ExtractOptions) => Promise<OutlineResult>;

type DocumentOutcome =
    | { ok: true; report: DocumentReport }
    | { ok: false; failure: DocumentFailure };

const PDF_FILE = /\.pdf$/i;

/**
 * Lists the PDFs directly inside `inputDir`, sorted by name.
 *
 * @throws {OutlineError} LOCATION_NOT_FOUND if the directory cannot be read
 */
export const discoverPdfs = async (inputDir: string): Promise<string[]> => {
    let entries: fs.Dirent[];
    try {
        entries = await fs.promises.readdir(inputDir, { withFileTypes: true });
    } catch {
        throw getOutlineError(OutlineErrorType.LOCATION_NOT_FOUND, inputDir);
    }

    return entries
        .filter((entry) => entry.isFile() && PDF_FILE.test(entry.name))
        .map((entry) => entry.name)
        .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
};

/** `<outputDir>/<stem>.json` for an input file name. */
export const outputPathFor = (outputDir: string, fileName: string): string =>
    path.join(outputDir, `${path.basename(fileName, path.extname(fileName))}.json`);

/**
 * Writes through a temporary sibling and a rename, so readers never see a partial file.
 */
const writeAtomically = async (target: string, content: string): Promise<void> => {
    const temp = `${target}.${process.pid}.tmp`;
    try {
        await fs.promises.writeFile(temp, content, 'utf8');
        await fs.promises.rename(temp, target);
    } catch (e) {
        await fs.promises.rm(temp, { force: true });
        throw e;
    }
};

const processDocument = async (
    fileName: string,
    paths: BatchPaths,
    config: ResolvedConfig,
    logger: Logger,
    extract: DocumentExtractor
): Promise<DocumentOutcome> => {
    const started = Date.now();
    const input = path.join(paths.inputDir, fileName);
    const output = outputPathFor(paths.outputDir, fileName);
    const log = logger.child({ file: fileName });

    try {
        const result = await withTimeout(
            (signal) => extract(input, config, { logger: log, signal, fileName }),
            config.timeoutMs
        );
        await writeAtomically(output, serializeOutput(result.outline));

        const report: DocumentReport = {
            file: fileName,
            output,
            headings: result.outline.outline.length,
            warnings: result.warnings,
            elapsedMs: Date.now() - started
        };
        log.info({ headings: report.headings, elapsedMs: report.elapsedMs }, 'Outline written');
        return { ok: true, report };
    } catch (e) {
        const error = getWrappedError(e, fileName);
        try {
            await fs.promises.rm(output, { force: true });
        } catch (rmError) {
            logWarning(log, `Could not remove ${output}`, rmError);
        }
        log.error({ type: error.type, elapsedMs: Date.now() - started }, error.message);
        return { ok: false, failure: { file: fileName, type: error.type, message: error.message } };
    }
};

/**
 * Maps each output path to the first input, in name order, that writes it.
 * `x.pdf` and `x.PDF` both write `x.json`.
 */
const claimOutputs = (files: readonly string[], outputDir: string): Map<string, string> => {
    const owners = new Map<string, string>();
    for (const fileName of files) {
        const output = outputPathFor(outputDir, fileName);
        if (!owners.has(output)) owners.set(output, fileName);
    }
    return owners;
};

/**
 * Extracts the outline of every PDF in `inputDir` and writes `<stem>.json` files to `outputDir`.
 *
 * Documents run in a pool of `config.concurrency` workers, each under `config.timeoutMs`.
 * Per-document errors become entries of `failed`, as does an input whose output name is
 * already taken by an earlier one; only an unreadable input directory
 * or an uncreatable output directory rejects.
 *
 * @param extract - Replaces the PDF extraction step, e.g. in tests
 */
export const processBatch = async (
    paths: BatchPaths,
    config: ResolvedConfig,
    logger: Logger,
    extract: DocumentExtractor = OutlineExtractor.extractOutline
): Promise<BatchSummary> => {
    const started = Date.now();
    const files = await discoverPdfs(paths.inputDir);
    await fs.promises.mkdir(paths.outputDir, { recursive: true });

    logger.debug({ documents: files.length, concurrency: config.concurrency }, 'Batch started');

    const owners = claimOutputs(files, paths.outputDir);
    const outcomes = await runPool(files, config.concurrency, async (fileName): Promise<DocumentOutcome> => {
        const output = outputPathFor(paths.outputDir, fileName);
        const owner = owners.get(output);
        if (owner !== undefined && owner !== fileName) {
            const error = getOutlineError(
                OutlineErrorType.OUTPUT_CONFLICT,
                `${fileName} and ${owner} both map to ${path.basename(output)}`
            );
            logger.error({ file: fileName, type: error.type }, error.message);
            return { ok: false, failure: { file: fileName, type: error.type, message: error.message } };
        }
        return processDocument(fileName, paths, config, logger, extract);
    });

    const summary: BatchSummary = { succeeded: [], failed: [], elapsedMs: 0 };
    for (const outcome of outcomes) {
        if (outcome.ok) {
            summary.succeeded.push(outcome.report);
        } else {
            summary.failed.push(outcome.failure);
        }
    }
    summary.elapsedMs = Date.now() - started;
    return summary;
};
