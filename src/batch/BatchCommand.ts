/**
 * Command-line front of the batch processor: argument parsing, config file loading,
 * per-document and summary logging, exit status.
 *
 * @module BatchCommand
 */

import * as fs from 'fs';
import { parseArgs } from 'util';
import type { Logger } from 'pino';
import { resolveConfig, type ResolvedConfig } from '../config';
import { ConfigError, getOutlineError, getWrappedError, OutlineErrorType } from '../utils/errorUtils';
import { createLogger } from '../utils/logger';
import { processBatch, type DocumentExtractor } from './BatchProcessor';

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_CONFIG = 2;

export const USAGE = `Usage: pdf-outline [options] [inputDir] [outputDir]

Extracts the title and H1-H3 outline of every PDF in inputDir (default ./input)
and writes <name>.json files to outputDir (default ./output).

Options:
  -c, --config <file>      JSON configuration file
  -j, --concurrency <n>    documents processed at once (default: CPU cores)
  -t, --timeout <ms>       per-document time budget (default: 10000)
  -l, --log-level <level>  fatal, error, warn, info, debug, trace or silent
  -p, --pretty             human-readable logs
  -h, --help               show this help
`;

export interface BatchCommandOptions {
    /** Receives the usage text. */
    print?: (text: string) => void;
    extract?: DocumentExtractor;
    /** Replaces the logger built from the configuration. */
    logger?: Logger;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const readConfigFile = (file: string): Record<string, unknown> => {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw getOutlineError(OutlineErrorType.INVALID_CONFIG, `${file}: ${reason}`);
    }
    if (!isRecord(parsed)) {
        throw getOutlineError(OutlineErrorType.INVALID_CONFIG, `${file}: expected a JSON object`);
    }
    return parsed;
};

const parseCommandLine = (argv: readonly string[]) =>
    parseArgs({
        args: [...argv],
        allowPositionals: true,
        strict: true,
        options: {
            config: { type: 'string', short: 'c' },
            concurrency: { type: 'string', short: 'j' },
            timeout: { type: 'string', short: 't' },
            'log-level': { type: 'string', short: 'l' },
            pretty: { type: 'boolean', short: 'p' },
            help: { type: 'boolean', short: 'h' }
        }
    });

export interface ParsedCommand {
    help: boolean;
    inputDir: string;
    outputDir: string;
    config: ResolvedConfig;
}

/**
 * Parses arguments and builds the configuration: file values first, flags on top.
 *
 * @throws {ConfigError} On unknown flags, unreadable config files or invalid values
 */
export const parseCommand = (argv: readonly string[]): ParsedCommand => {
    let parsed: ReturnType<typeof parseCommandLine>;
    try {
        parsed = parseCommandLine(argv);
    } catch (e) {
        throw getOutlineError(OutlineErrorType.INVALID_CONFIG, e instanceof Error ? e.message : String(e));
    }

    const { values, positionals } = parsed;
    if (positionals.length > 2) {
        throw getOutlineError(OutlineErrorType.INVALID_CONFIG, `unexpected argument ${positionals[2]}`);
    }

    const raw: Record<string, unknown> = values.config ? readConfigFile(values.config) : {};
    if (values.concurrency !== undefined) raw.concurrency = Number(values.concurrency);
    if (values.timeout !== undefined) raw.timeoutMs = Number(values.timeout);
    if (values['log-level'] !== undefined) raw.logLevel = values['log-level'];
    if (values.pretty) raw.prettyLogs = true;

    return {
        help: values.help === true,
        inputDir: positionals[0] ?? 'input',
        outputDir: positionals[1] ?? 'output',
        config: resolveConfig(raw)
    };
};

/**
 * Runs the batch command and resolves to the process exit status:
 * 0 when every document succeeded (or there was none), 1 when any failed or the batch
 * could not run, 2 for configuration errors.
 */
export const runBatchCommand = async (argv: readonly string[], options: BatchCommandOptions = {}): Promise<number> => {
    const print = options.print ?? ((text: string) => process.stdout.write(text));

    let command: ParsedCommand;
    try {
        command = parseCommand(argv);
    } catch (e) {
        if (e instanceof ConfigError) {
            const logger = options.logger ?? createLogger({ logLevel: 'error', prettyLogs: false });
            logger.fatal({ type: e.type }, e.message);
            print(USAGE);
            return EXIT_CONFIG;
        }
        throw e;
    }

    if (command.help) {
        print(USAGE);
        return EXIT_OK;
    }

    const { config } = command;
    const logger = options.logger ?? createLogger(config);

    try {
        const summary = await processBatch(
            { inputDir: command.inputDir, outputDir: command.outputDir },
            config,
            logger,
            options.extract
        );

        const total = summary.succeeded.length + summary.failed.length;
        if (total === 0) {
            logger.warn({ inputDir: command.inputDir }, 'No PDF files found');
            return EXIT_OK;
        }

        logger.info(
            {
                succeeded: summary.succeeded.length,
                failed: summary.failed.map((failure) => failure.file),
                elapsedMs: summary.elapsedMs
            },
            `Processed ${total} document(s): ${summary.succeeded.length} succeeded, ${summary.failed.length} failed`
        );
        return summary.failed.length === 0 ? EXIT_OK : EXIT_FAILURES;
    } catch (e) {
        const error = getWrappedError(e, command.inputDir);
        logger.fatal({ type: error.type }, error.message);
        return EXIT_FAILURES;
    }
};
