/**
 * Configuration
 *
 * Thresholds, signal weights and pattern tables are validated once with zod, compiled,
 * frozen and then handed to every component. Nothing reads configuration from ambient
 * state after startup.
 *
 * @module config
 */

import * as os from 'os';
import { z } from 'zod';
import { getOutlineError, OutlineErrorType } from './utils/errorUtils';

/**
 * Names of the scoring signals. Each has a weight in {@link OutlineExtractorConfig.weights}.
 */
export const SIGNAL_NAMES = ['fontTier', 'bold', 'capitalization', 'titleCase', 'pattern', 'position', 'length'] as const;

export type SignalName = typeof SIGNAL_NAMES[number];

/** Patterns for text that is never a heading (captions, page labels, contact details). */
export const DEFAULT_SKIP_PATTERNS: readonly string[] = [
    '^(fig\\.|figure|table|equation)\\s*\\d+',
    '^page\\s+\\d+(\\s+of\\s+\\d+)?$',
    '^\\d+$',
    '^[\\w.+-]+@[\\w-]+\\.[\\w.]+$',
    '^(https?://|www\\.)\\S+$'
];

/** Metadata titles matching any of these are generic and ignored. */
export const DEFAULT_PLACEHOLDER_TITLE_PATTERNS: readonly string[] = [
    '^untitled\\b',
    '^microsoft (word|powerpoint) - ',
    '\\.(docx?|pdf|txt|rtf|pptx?)$',
    '^document\\d*$'
];

const weightsSchema = z.object({
    fontTier: z.number().min(0).default(0.4),
    bold: z.number().min(0).default(0.25),
    capitalization: z.number().min(0).default(0.15),
    titleCase: z.number().min(0).default(0.1),
    pattern: z.number().min(0).default(0.3),
    position: z.number().min(0).default(0.1),
    length: z.number().max(0).default(-0.3)
});

const regexSource = z.string().superRefine((source, ctx) => {
    try {
        new RegExp(source, 'i');
    } catch (e) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `not a valid regular expression: ${e instanceof Error ? e.message : String(e)}`
        });
    }
});

const configSchema = z.object({
    maxPages: z.number().int().positive().default(50),
    minBodyWords: z.number().min(0).default(5),
    maxHeadingLength: z.number().int().positive().default(150),
    lengthPenaltyStart: z.number().int().min(0).default(80),
    boilerplate: z.object({
        pageRatio: z.number().gt(0).max(1).default(0.5),
        minPages: z.number().int().min(2).default(3),
        positionTolerance: z.number().gt(0).lt(1).default(0.02)
    }).default({}),
    topRegionRatio: z.number().gt(0).max(1).default(1 / 3),
    mergeGapRatio: z.number().min(0).default(0.8),
    acceptanceThreshold: z.number().min(0).default(0.45),
    weights: weightsSchema.default({}),
    skipPatterns: z.array(regexSource).default([...DEFAULT_SKIP_PATTERNS]),
    placeholderTitlePatterns: z.array(regexSource).default([...DEFAULT_PLACEHOLDER_TITLE_PATTERNS]),
    timeoutMs: z.number().int().positive().default(10_000),
    concurrency: z.number().int().positive().optional(),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    prettyLogs: z.boolean().default(false),
    pdfWorkerSrc: z.string().min(1).optional()
}).strict().refine((config) => config.lengthPenaltyStart < config.maxHeadingLength, {
    message: 'lengthPenaltyStart must be smaller than maxHeadingLength',
    path: ['lengthPenaltyStart']
});

/**
 * Configuration accepted from callers, a JSON file or CLI flags. Every key is optional.
 */
export type OutlineExtractorConfig = z.input<typeof configSchema>;

export type SignalWeights = Readonly<Record<SignalName, number>>;

/**
 * Validated, compiled and frozen configuration shared read-only by all components.
 */
export interface ResolvedConfig {
    readonly maxPages: number;
    readonly minBodyWords: number;
    readonly maxHeadingLength: number;
    readonly lengthPenaltyStart: number;
    readonly boilerplate: Readonly<{
        pageRatio: number;
        minPages: number;
        positionTolerance: number;
    }>;
    readonly topRegionRatio: number;
    readonly mergeGapRatio: number;
    readonly acceptanceThreshold: number;
    readonly weights: SignalWeights;
    readonly skipPatterns: readonly RegExp[];
    readonly placeholderTitlePatterns: readonly RegExp[];
    readonly timeoutMs: number;
    readonly concurrency: number;
    readonly logLevel: z.output<typeof configSchema>['logLevel'];
    readonly prettyLogs: boolean;
    readonly pdfWorkerSrc?: string;
}

const resolvedConfigs = new WeakSet<object>();

/** True for configuration objects returned by {@link resolveConfig}. */
export const isResolvedConfig = (config: object): config is ResolvedConfig => resolvedConfigs.has(config);

const formatIssues = (error: z.ZodError): string =>
    error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');

/**
 * Validates raw configuration and returns the frozen, compiled form.
 *
 * @param raw - Partial configuration; omitted keys take their defaults
 * @throws {ConfigError} If any value is out of range or a pattern does not compile
 */
export const resolveConfig = (raw: unknown = {}): ResolvedConfig => {
    const parsed = configSchema.safeParse(raw ?? {});
    if (!parsed.success) {
        throw getOutlineError(OutlineErrorType.INVALID_CONFIG, formatIssues(parsed.error));
    }

    const value = parsed.data;
    const resolved: ResolvedConfig = {
        maxPages: value.maxPages,
        minBodyWords: value.minBodyWords,
        maxHeadingLength: value.maxHeadingLength,
        lengthPenaltyStart: value.lengthPenaltyStart,
        boilerplate: Object.freeze({ ...value.boilerplate }),
        topRegionRatio: value.topRegionRatio,
        mergeGapRatio: value.mergeGapRatio,
        acceptanceThreshold: value.acceptanceThreshold,
        weights: Object.freeze({ ...value.weights }),
        skipPatterns: Object.freeze(value.skipPatterns.map((source) => new RegExp(source, 'i'))),
        placeholderTitlePatterns: Object.freeze(value.placeholderTitlePatterns.map((source) => new RegExp(source, 'i'))),
        timeoutMs: value.timeoutMs,
        concurrency: value.concurrency ?? Math.max(1, os.availableParallelism()),
        logLevel: value.logLevel,
        prettyLogs: value.prettyLogs,
        pdfWorkerSrc: value.pdfWorkerSrc
    };

    Object.freeze(resolved);
    resolvedConfigs.add(resolved);
    return resolved;
};

/** Configuration with every default applied. */
export const DEFAULT_CONFIG: ResolvedConfig = resolveConfig();
