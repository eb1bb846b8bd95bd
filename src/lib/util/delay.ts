import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Waits for `ms`. Resolves to false instead of waiting out the time when the signal aborts.
 */
export const delay = async (ms: number, signal?: AbortSignal): Promise<boolean> => {
    try {
        await sleep(ms, undefined, { signal });
        return true;
    } catch (err) {
        if (signal?.aborted) {
            return false;
        }

        throw err;
    }
};
