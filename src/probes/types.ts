import { errorMessage } from '~/utils';

export interface ProbeSuccess<T> {
    success: true,
    payload: T,
}

export interface ProbeFailure {
    success: false,
    reason: string,
}

export type ProbeResult<T = void> = ProbeSuccess<T> | ProbeFailure;

export function succeeded<T>(payload: T): ProbeSuccess<T> {
    return { success: true, payload };
}

export function failed(reason: string): ProbeFailure {
    return { success: false, reason };
}

// The only place where a probe error turns into a result.
export async function settleProbe<T>(operation: Promise<T>): Promise<ProbeResult<T>> {
    try {
        return succeeded(await operation);
    } catch (e) {
        return failed(errorMessage(e).trim());
    }
}
