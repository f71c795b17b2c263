import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import pino from 'pino';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { resolveConfig } from '../../config';
import type { OutlineResult } from '../../types';
import { getOutlineError, OutlineError, OutlineErrorType } from '../../utils/errorUtils';
import { discoverPdfs, outputPathFor, processBatch, type DocumentExtractor } from '../BatchProcessor';

const logger = pino({ level: 'silent' });
const config = resolveConfig({ timeoutMs: 200, concurrency: 2, logLevel: 'silent' });

const result = (title: string): OutlineResult => ({
    outline: { title, outline: [{ level: 'H1', text: '1. Introduction', page: 1 }] },
    warnings: [],
    pageCount: 1
});

const waitForAbort = (signal?: AbortSignal): Promise<never> =>
    new Promise<never>((_, reject) => {
        signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
    });

/** Stands in for the PDF extractor: the file name decides the outcome. */
const fakeExtract: DocumentExtractor = async (file, _config, options) => {
    const name = path.basename(file);
    if (name.startsWith('broken')) throw getOutlineError(OutlineErrorType.FILE_CORRUPTED, name);
    if (name.startsWith('slow')) return waitForAbort(options.signal);
    if (name.startsWith('scan')) {
        return { outline: { title: '', outline: [] }, warnings: ['no text'], pageCount: 2 };
    }
    return result(path.basename(name, path.extname(name)));
};

let workDir: string;
let inputDir: string;
let outputDir: string;

const touch = (...names: string[]) => {
    for (const name of names) fs.writeFileSync(path.join(inputDir, name), '%PDF-1.7 placeholder');
};

beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pdf-outline-'));
    inputDir = path.join(workDir, 'input');
    outputDir = path.join(workDir, 'output');
    fs.mkdirSync(inputDir);
});

afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
});

describe('discoverPdfs', () => {
    it('lists PDFs directly inside the directory, sorted by name', async () => {
        touch('b.pdf', 'a.PDF', 'notes.txt');
        fs.mkdirSync(path.join(inputDir, 'nested.pdf'));

        await expect(discoverPdfs(inputDir)).resolves.toEqual(['a.PDF', 'b.pdf']);
    });

    it('fails with LOCATION_NOT_FOUND for a missing directory', async () => {
        const missing = path.join(workDir, 'missing');

        await expect(discoverPdfs(missing)).rejects.toBeInstanceOf(OutlineError);
        await expect(discoverPdfs(missing)).rejects.toMatchObject({ type: OutlineErrorType.LOCATION_NOT_FOUND });
    });
});

describe('outputPathFor', () => {
    it('names the output after the input stem', () => {
        expect(outputPathFor('/out', 'Annual Report.PDF')).toBe(path.join('/out', 'Annual Report.json'));
    });
});

describe('processBatch', () => {
    it('writes one JSON file per PDF', async () => {
        touch('alpha.pdf', 'beta.pdf');

        const summary = await processBatch({ inputDir, outputDir }, config, logger, fakeExtract);

        expect(summary.failed).toEqual([]);
        expect(summary.succeeded.map((report) => [report.file, report.output, report.headings])).toEqual([
            ['alpha.pdf', path.join(outputDir, 'alpha.json'), 1],
            ['beta.pdf', path.join(outputDir, 'beta.json'), 1]
        ]);
        expect(fs.readFileSync(path.join(outputDir, 'alpha.json'), 'utf8')).toBe(
            '{\n  "title": "alpha",\n  "outline": [\n    {\n      "level": "H1",\n      "text": "1. Introduction",\n      "page": 1\n    }\n  ]\n}\n'
        );
    });

    it('records failures, removes their stale output and keeps going', async () => {
        touch('alpha.pdf', 'broken.pdf', 'gamma.pdf');
        fs.mkdirSync(outputDir);
        fs.writeFileSync(path.join(outputDir, 'broken.json'), '{"title":"old"}');

        const summary = await processBatch({ inputDir, outputDir }, config, logger, fakeExtract);

        expect(summary.succeeded.map((report) => report.file)).toEqual(['alpha.pdf', 'gamma.pdf']);
        expect(summary.failed).toEqual([
            {
                file: 'broken.pdf',
                type: 'FILE_CORRUPTED',
                message: '[PdfOutline]: broken.pdf seems to be corrupted and could not be opened as a PDF.'
            }
        ]);
        expect(fs.readdirSync(outputDir).sort()).toEqual(['alpha.json', 'gamma.json']);
    });

    it('keeps going when stale output of a failed document cannot be removed', async () => {
        touch('alpha.pdf', 'broken.pdf');
        fs.mkdirSync(path.join(outputDir, 'broken.json'), { recursive: true });

        const summary = await processBatch({ inputDir, outputDir }, config, logger, fakeExtract);

        expect(summary.succeeded.map((report) => report.file)).toEqual(['alpha.pdf']);
        expect(summary.failed.map((failure) => [failure.file, failure.type])).toEqual([['broken.pdf', 'FILE_CORRUPTED']]);
        expect(fs.statSync(path.join(outputDir, 'broken.json')).isDirectory()).toBe(true);
    });

    it('fails the later of two inputs that map to the same output file', async () => {
        touch('alpha.pdf', 'alpha.PDF');

        const summary = await processBatch({ inputDir, outputDir }, config, logger, fakeExtract);

        expect(summary.succeeded.map((report) => report.file)).toEqual(['alpha.PDF']);
        expect(summary.failed).toEqual([
            {
                file: 'alpha.pdf',
                type: 'OUTPUT_CONFLICT',
                message: '[PdfOutline]: Output file is already taken: alpha.pdf and alpha.PDF both map to alpha.json'
            }
        ]);
        expect(fs.readdirSync(outputDir)).toEqual(['alpha.json']);
    });

    it('fails a document that exceeds the time budget without stalling the rest', async () => {
        touch('alpha.pdf', 'slow.pdf');

        const summary = await processBatch({ inputDir, outputDir }, config, logger, fakeExtract);

        expect(summary.succeeded.map((report) => report.file)).toEqual(['alpha.pdf']);
        expect(summary.failed).toEqual([
            {
                file: 'slow.pdf',
                type: 'TIMEOUT',
                message: '[PdfOutline]: Processing exceeded the time budget of 200 ms.'
            }
        ]);
        expect(fs.existsSync(path.join(outputDir, 'slow.json'))).toBe(false);
    });

    it('writes an empty outline for a document without text and keeps its warnings', async () => {
        touch('scan.pdf');

        const summary = await processBatch({ inputDir, outputDir }, config, logger, fakeExtract);

        expect(summary.succeeded).toHaveLength(1);
        expect(summary.succeeded[0].warnings).toEqual(['no text']);
        expect(JSON.parse(fs.readFileSync(path.join(outputDir, 'scan.json'), 'utf8'))).toEqual({ title: '', outline: [] });
    });

    it('creates the output directory and returns an empty summary for an empty input', async () => {
        const nested = path.join(outputDir, 'deep');

        const summary = await processBatch({ inputDir, outputDir: nested }, config, logger, fakeExtract);

        expect(summary.succeeded).toEqual([]);
        expect(summary.failed).toEqual([]);
        expect(fs.statSync(nested).isDirectory()).toBe(true);
    });

    it('fails as a whole only when the input directory is missing', async () => {
        await expect(
            processBatch({ inputDir: path.join(workDir, 'nowhere'), outputDir }, config, logger, fakeExtract)
        ).rejects.toMatchObject({ type: OutlineErrorType.LOCATION_NOT_FOUND });
    });

    it('turns a real non-PDF input into a NOT_A_PDF failure', async () => {
        fs.writeFileSync(path.join(inputDir, 'fake.pdf'), 'just some text, not a document');

        const summary = await processBatch({ inputDir, outputDir }, config, logger);

        expect(summary.failed).toEqual([
            { file: 'fake.pdf', type: 'NOT_A_PDF', message: '[PdfOutline]: fake.pdf is not a PDF document.' }
        ]);
    });
});
