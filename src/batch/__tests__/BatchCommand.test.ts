import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import pino from 'pino';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getOutlineError, OutlineErrorType } from '../../utils/errorUtils';
import { EXIT_CONFIG, EXIT_FAILURES, EXIT_OK, parseCommand, runBatchCommand, USAGE } from '../BatchCommand';
import type { DocumentExtractor } from '../BatchProcessor';

const logger = pino({ level: 'silent' });

const fakeExtract: DocumentExtractor = async (file) => {
    if (path.basename(file).startsWith('broken')) {
        throw getOutlineError(OutlineErrorType.PDF_ENCRYPTED, path.basename(file));
    }
    return { outline: { title: 'T', outline: [] }, warnings: [], pageCount: 1 };
};

let workDir: string;
let inputDir: string;
let outputDir: string;

beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pdf-outline-cli-'));
    inputDir = path.join(workDir, 'input');
    outputDir = path.join(workDir, 'output');
    fs.mkdirSync(inputDir);
});

afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
});

const run = (argv: string[], print: (text: string) => void = () => undefined) =>
    runBatchCommand(argv, { logger, print, extract: fakeExtract });

describe('parseCommand', () => {
    it('reads directories and flags', () => {
        const command = parseCommand(['in', 'out', '-j', '3', '--timeout', '2500', '--log-level', 'silent']);

        expect(command.inputDir).toBe('in');
        expect(command.outputDir).toBe('out');
        expect(command.help).toBe(false);
        expect(command.config.concurrency).toBe(3);
        expect(command.config.timeoutMs).toBe(2500);
        expect(command.config.logLevel).toBe('silent');
    });

    it('defaults to ./input and ./output', () => {
        const command = parseCommand([]);

        expect(command.inputDir).toBe('input');
        expect(command.outputDir).toBe('output');
    });

    it('lets flags override the config file', () => {
        const file = path.join(workDir, 'outline.json');
        fs.writeFileSync(file, JSON.stringify({ acceptanceThreshold: 0.6, timeoutMs: 5000 }));

        const command = parseCommand(['--config', file, '-t', '8000']);

        expect(command.config.acceptanceThreshold).toBe(0.6);
        expect(command.config.timeoutMs).toBe(8000);
    });
});

describe('runBatchCommand', () => {
    it('prints the usage for --help', async () => {
        const print = vi.fn();

        await expect(run(['--help'], print)).resolves.toBe(EXIT_OK);
        expect(print).toHaveBeenCalledWith(USAGE);
    });

    it('exits with 2 on configuration errors', async () => {
        const badFile = path.join(workDir, 'bad.json');
        fs.writeFileSync(badFile, '[1, 2]');

        await expect(run(['--timeout', 'soon', inputDir, outputDir])).resolves.toBe(EXIT_CONFIG);
        await expect(run(['--bogus'])).resolves.toBe(EXIT_CONFIG);
        await expect(run(['--config', badFile, inputDir, outputDir])).resolves.toBe(EXIT_CONFIG);
        await expect(run(['a', 'b', 'c'])).resolves.toBe(EXIT_CONFIG);
        expect(fs.existsSync(outputDir)).toBe(false);
    });

    it('exits with 0 when every document succeeds', async () => {
        fs.writeFileSync(path.join(inputDir, 'one.pdf'), '');

        await expect(run([inputDir, outputDir])).resolves.toBe(EXIT_OK);
        expect(fs.existsSync(path.join(outputDir, 'one.json'))).toBe(true);
    });

    it('exits with 1 when any document fails', async () => {
        fs.writeFileSync(path.join(inputDir, 'one.pdf'), '');
        fs.writeFileSync(path.join(inputDir, 'broken.pdf'), '');

        await expect(run([inputDir, outputDir])).resolves.toBe(EXIT_FAILURES);
        expect(fs.readdirSync(outputDir)).toEqual(['one.json']);
    });

    it('exits with 0 for an empty input directory', async () => {
        await expect(run([inputDir, outputDir])).resolves.toBe(EXIT_OK);
    });

    it('exits with 1 when the input directory is missing', async () => {
        await expect(run([path.join(workDir, 'missing'), outputDir])).resolves.toBe(EXIT_FAILURES);
    });
});
