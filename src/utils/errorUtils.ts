/**
 * Error Handling Utilities
 *
 * Centralized error management for the outline extractor. Every error raised by the
 * library belongs to one of the types below, carries a message from the lookup table,
 * and is an instance of the class the type maps to, so callers can branch on either.
 */

import type { Logger } from 'pino';

/** Error header prefix for all error messages */
const ERRORHEADER = '[PdfOutline]: ';

/**
 * Standard error types.
 */
export enum OutlineErrorType {
    /** Arguments passed to the function are missing or invalid */
    IMPROPER_ARGUMENTS = 'IMPROPER_ARGUMENTS',
    /** Input type is not a supported type (string, Buffer, ArrayBuffer) */
    INVALID_INPUT = 'INVALID_INPUT',
    /** File could not be found at the specified path */
    FILE_DOES_NOT_EXIST = 'FILE_DOES_NOT_EXIST',
    /** Specified location is not a reachable directory */
    LOCATION_NOT_FOUND = 'LOCATION_NOT_FOUND',
    /** Byte stream is not a PDF at all */
    NOT_A_PDF = 'NOT_A_PDF',
    /** File claims to be a PDF but cannot be opened */
    FILE_CORRUPTED = 'FILE_CORRUPTED',
    /** PDF requires a password */
    PDF_ENCRYPTED = 'PDF_ENCRYPTED',
    /** No extractable text (e.g. a scanned document) */
    NO_TEXT = 'NO_TEXT',
    /** Per-document time budget exceeded */
    TIMEOUT = 'TIMEOUT',
    /** Invalid threshold or pattern configuration */
    INVALID_CONFIG = 'INVALID_CONFIG',
    /** Another input in the batch already writes to the same output file */
    OUTPUT_CONFLICT = 'OUTPUT_CONFLICT'
}

type MessageBuilder = string | ((info: string) => string);

/**
 * Lookup table for error messages.
 * Function entries build the message from the extra info passed by the caller.
 */
const ERROR_MESSAGES: Record<OutlineErrorType, MessageBuilder> = {
    [OutlineErrorType.IMPROPER_ARGUMENTS]: 'Improper arguments',
    [OutlineErrorType.INVALID_INPUT]: 'Invalid input type: Expected a Buffer, an ArrayBuffer or a valid file path',
    [OutlineErrorType.FILE_DOES_NOT_EXIST]: (filepath) => `File ${filepath} could not be found! Check if the file exists or verify the relative path from your terminal's location.`,
    [OutlineErrorType.LOCATION_NOT_FOUND]: (location) => `Entered location ${location} is not reachable! Make sure the directory exists.`,
    [OutlineErrorType.NOT_A_PDF]: (source) => `${source} is not a PDF document.`,
    [OutlineErrorType.FILE_CORRUPTED]: (source) => `${source} seems to be corrupted and could not be opened as a PDF.`,
    [OutlineErrorType.PDF_ENCRYPTED]: (source) => `${source} is password protected.`,
    [OutlineErrorType.NO_TEXT]: (source) => `${source} has no extractable text; it may be a scanned document.`,
    [OutlineErrorType.TIMEOUT]: (budget) => `Processing exceeded the time budget of ${budget}.`,
    [OutlineErrorType.INVALID_CONFIG]: (issues) => `Invalid configuration: ${issues}`,
    [OutlineErrorType.OUTPUT_CONFLICT]: (details) => `Output file is already taken: ${details}`
};

/**
 * Base class of every error raised by the library.
 */
export class OutlineError extends Error {
    readonly type: OutlineErrorType;

    constructor(type: OutlineErrorType, message: string) {
        super(message);
        this.name = 'OutlineError';
        this.type = type;
    }
}

/** The source PDF is unreadable, corrupt, encrypted or not a PDF. Never retried. */
export class ParseError extends OutlineError {
    constructor(type: OutlineErrorType, message: string) {
        super(type, message);
        this.name = 'ParseError';
    }
}

/** Soft error: the document has no usable text. Reported as a warning, never thrown out of a run. */
export class NoTextError extends OutlineError {
    constructor(type: OutlineErrorType, message: string) {
        super(type, message);
        this.name = 'NoTextError';
    }
}

export class TimeoutError extends OutlineError {
    constructor(type: OutlineErrorType, message: string) {
        super(type, message);
        this.name = 'TimeoutError';
    }
}

/** Fatal at startup: nothing is processed with an invalid configuration. */
export class ConfigError extends OutlineError {
    constructor(type: OutlineErrorType, message: string) {
        super(type, message);
        this.name = 'ConfigError';
    }
}

type OutlineErrorClass = new (type: OutlineErrorType, message: string) => OutlineError;

const ERROR_CLASSES: Record<OutlineErrorType, OutlineErrorClass> = {
    [OutlineErrorType.IMPROPER_ARGUMENTS]: OutlineError,
    [OutlineErrorType.INVALID_INPUT]: OutlineError,
    [OutlineErrorType.LOCATION_NOT_FOUND]: OutlineError,
    [OutlineErrorType.FILE_DOES_NOT_EXIST]: ParseError,
    [OutlineErrorType.NOT_A_PDF]: ParseError,
    [OutlineErrorType.FILE_CORRUPTED]: ParseError,
    [OutlineErrorType.PDF_ENCRYPTED]: ParseError,
    [OutlineErrorType.NO_TEXT]: NoTextError,
    [OutlineErrorType.TIMEOUT]: TimeoutError,
    [OutlineErrorType.INVALID_CONFIG]: ConfigError,
    [OutlineErrorType.OUTPUT_CONFLICT]: OutlineError
};

/**
 * Creates a formatted error message for a specific error type.
 */
const createOutlineErrorMessage = (type: OutlineErrorType, info = ''): string => {
    const msg = ERROR_MESSAGES[type];
    return ERRORHEADER + (typeof msg === 'function' ? msg(info) : msg);
};

/**
 * Creates the error for a specific error type, as an instance of the class the type maps to.
 *
 * @param type - The type of error
 * @param info - Additional information used in the message (file path, budget, issues)
 * @returns The error object to be thrown
 */
export const getOutlineError = (type: OutlineErrorType, info?: string): OutlineError => {
    const ErrorClass = ERROR_CLASSES[type];
    return new ErrorClass(type, createOutlineErrorMessage(type, info));
};

/**
 * Reads the `name` and `message` of anything thrown, without trusting its shape.
 */
const describeThrown = (error: unknown): { name: string; message: string } => {
    if (error instanceof Error) {
        return { name: error.name, message: error.message };
    }
    if (typeof error === 'object' && error !== null) {
        const name = 'name' in error && typeof error.name === 'string' ? error.name : '';
        const message = 'message' in error && typeof error.message === 'string' ? error.message : String(error);
        return { name, message };
    }
    return { name: '', message: String(error) };
};

/**
 * Wraps a foreign error (pdfjs exceptions, fs errors) into the library's taxonomy.
 * Errors that already belong to the taxonomy are returned unchanged.
 *
 * @param error - The original error
 * @param source - File path or label used in the message
 */
export const getWrappedError = (error: unknown, source = 'The document'): OutlineError => {
    if (error instanceof OutlineError) return error;

    const { name, message } = describeThrown(error);

    if (name === 'PasswordException' || /password/i.test(message)) {
        return getOutlineError(OutlineErrorType.PDF_ENCRYPTED, source);
    }
    if (name === 'InvalidPDFException' || name === 'FormatError' || /Invalid PDF structure|Invalid XRef/i.test(message)) {
        return getOutlineError(OutlineErrorType.FILE_CORRUPTED, source);
    }
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return getOutlineError(OutlineErrorType.FILE_DOES_NOT_EXIST, source);
    }

    return new ParseError(OutlineErrorType.FILE_CORRUPTED, `${ERRORHEADER}${source}: ${message}`);
};

/**
 * Logs a non-fatal problem that shouldn't stop processing.
 *
 * @param logger - Logger to write to
 * @param message - The warning message
 * @param error - Optional original error object for more context
 */
export const logWarning = (logger: Logger, message: string, error?: unknown): void => {
    if (error !== undefined) {
        logger.warn({ err: error }, message);
    } else {
        logger.warn(message);
    }
};
