/**
 * Time budget helpers.
 *
 * @module timeoutUtils
 */

import { getOutlineError, OutlineErrorType } from './errorUtils';

/**
 * Runs a task under a wall-clock budget.
 *
 * The task receives an `AbortSignal` that fires when the budget runs out, so it can stop
 * its own work; the returned promise rejects with a `TimeoutError` at that moment whether
 * or not the task reacts.
 *
 * @param task - Work to run; should stop when the signal aborts
 * @param timeoutMs - Budget in milliseconds
 * @param label - Used in the error message
 */
export async function withTimeout<T>(task: (signal: AbortSignal) => Promise<T>, timeoutMs: number, label = `${timeoutMs} ms`): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = getOutlineError(OutlineErrorType.TIMEOUT, label);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([task(controller.signal), expired]);
    } finally {
        clearTimeout(timer);
    }
}
