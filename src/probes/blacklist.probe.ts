import { Resolver } from 'dns/promises';
import { DNSBL_ZONE } from '~/config';
import { raceWithTimeout } from '~/probes/timeout';
import { failed, ProbeResult, settleProbe } from '~/probes/types';
import { reverseIpv4 } from '~/utils';

export type Resolve4 = (hostname: string, timeout: number, signal: AbortSignal) => Promise<string[]>;

export interface BlacklistPayload {
    // DNSBL return codes, e.g. 127.0.0.2
    listedAs: string[],
}

export const resolveWithDns: Resolve4 = (hostname, timeout, signal) => {
    const resolver = new Resolver({ timeout, tries: 1 });

    signal.addEventListener('abort', () => resolver.cancel(), { once: true });

    return resolver.resolve4(hostname);
};

export function dnsblHostname(ip: string, zone: string): string | undefined {
    const reversed = reverseIpv4(ip);

    return reversed ? `${ reversed }.${ zone }` : undefined;
}

/**
 * Success means listed. NXDOMAIN, any resolver error and a non-ipv4 address all mean not listed.
 */
export async function probeBlacklist(
    ip: string,
    timeout: number,
    zone: string = DNSBL_ZONE,
    resolve4: Resolve4 = resolveWithDns,
): Promise<ProbeResult<BlacklistPayload>> {
    const hostname = dnsblHostname(ip, zone);

    if (!hostname) return failed(`${ ip } is not an ipv4 address`);

    return settleProbe(raceWithTimeout(async (signal) => {
        const addresses = await resolve4(hostname, timeout, signal);

        if (!addresses.length) throw new Error(`${ hostname } has no records`);

        return { listedAs: addresses };
    }, timeout));
}
