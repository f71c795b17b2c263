/**
 * Logging
 *
 * One pino logger per process. Pretty output goes through a pino-pretty stream,
 * otherwise plain JSON lines are written to stdout.
 *
 * @module logger
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';
import pinoPretty from 'pino-pretty';

export interface LoggerOptions {
    logLevel: LevelWithSilent;
    prettyLogs: boolean;
}

export const createLogger = ({ logLevel, prettyLogs }: LoggerOptions): Logger => {
    const options = {
        name: 'pdf-outline',
        level: logLevel,
        base: undefined,
        timestamp: pino.stdTimeFunctions.isoTime
    };

    if (!prettyLogs) {
        return pino(options);
    }

    return pino(
        options,
        pinoPretty({
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
            singleLine: true
        })
    );
};

/** Logger that drops everything; the default for library calls made without one. */
export const silentLogger: Logger = pino({ level: 'silent' });
