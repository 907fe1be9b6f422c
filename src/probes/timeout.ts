import { ProbeTimeoutError } from '~/proxy_checker/errors';

/**
 * Settles with whichever comes first: the operation or the timer.
 * When the timer wins the signal is aborted, the operation is expected to close its connection on it.
 */
export function raceWithTimeout<T>(operation: (signal: AbortSignal) => Promise<T>, timeout: number): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timer_promise = new Promise<never>((resolve, reject) => {
        timer = setTimeout(() => {
            const error = new ProbeTimeoutError(timeout);

            controller.abort(error);
            reject(error);
        }, timeout);
    });

    let running: Promise<T>;

    try {
        running = operation(controller.signal);
    } catch (e) {
        running = Promise.reject(e);
    }

    return Promise.race([ running, timer_promise ])
    .finally(() => clearTimeout(timer));
}
