import * as ping from 'ping';
import { raceWithTimeout } from '~/probes/timeout';
import { ProbeResult, settleProbe } from '~/probes/types';
import { Endpoint } from '~/types';

export interface ReachabilityPayload {
    timeMs?: number,
}

/**
 * ICMP echo to the proxy host. Many proxies drop ICMP while serving traffic,
 * so this is an auxiliary signal and never decides liveness.
 */
export function probeReachability(endpoint: Endpoint, timeout: number): Promise<ProbeResult<ReachabilityPayload>> {
    // the system ping takes whole seconds
    const seconds = Math.max(1, Math.ceil(timeout / 1000));

    // The child process cannot be aborted, the deadline ends it at most a second after the race is lost.
    return settleProbe(raceWithTimeout(async () => {
        const response = await ping.promise.probe(endpoint.host, {
            timeout: seconds,
            deadline: seconds,
        });

        if (!response.alive) throw new Error(`no echo reply from ${ endpoint.host }`);

        return { timeMs: typeof response.time === 'number' ? response.time : undefined };
    }, timeout));
}
