import { AgentOptions as HttpsAgentOptions } from 'https';
import { DNSBL_ZONE, HTTPS_TEST_URL, SOCKS_PROBE_TARGET, SPEED_TEST_URL } from '~/config';
import { Echo, EchoResponse } from '~/echo/Echo';
import { HttpbinEcho } from '~/echo/httpbin.echo';
import { BlacklistPayload, probeBlacklist, Resolve4, resolveWithDns } from '~/probes/blacklist.probe';
import { HttpsPayload, probeHttp, probeHttps } from '~/probes/http.probe';
import { probeReachability, ReachabilityPayload } from '~/probes/icmp.probe';
import { probeSocks4, probeSocks5, probeTcp } from '~/probes/socket.probe';
import { probeSpeed, SpeedMeasurement } from '~/probes/speed.probe';
import { ProbeResult } from '~/probes/types';
import { Endpoint } from '~/types';

export type { ProbeResult } from '~/probes/types';

/**
 * Every probe resolves, none of them throws. Failure is a result like any other.
 */
export interface ProbeSet {
    reachability(endpoint: Endpoint, timeout: number): Promise<ProbeResult<ReachabilityPayload>>;

    tcp(endpoint: Endpoint, timeout: number): Promise<ProbeResult>;

    socks5(endpoint: Endpoint, timeout: number): Promise<ProbeResult>;

    socks4(endpoint: Endpoint, timeout: number): Promise<ProbeResult>;

    http(endpoint: Endpoint, timeout: number): Promise<ProbeResult<EchoResponse>>;

    https(endpoint: Endpoint, timeout: number): Promise<ProbeResult<HttpsPayload>>;

    speed(endpoint: Endpoint, timeout: number): Promise<ProbeResult<SpeedMeasurement>>;

    // Success means the ip is listed.
    blacklist(ip: string, timeout: number): Promise<ProbeResult<BlacklistPayload>>;
}

export interface ProbeTargets {
    echo: Echo,
    httpsUrl: string,
    httpsAgentOptions: HttpsAgentOptions,
    speedUrl: string,
    dnsblZone: string,
    socksTarget: Endpoint,
    resolve4: Resolve4,
}

export function createProbeSet(targets: Partial<ProbeTargets> = {}): ProbeSet {
    const {
        echo = new HttpbinEcho(),
        httpsUrl = HTTPS_TEST_URL,
        httpsAgentOptions = {},
        speedUrl = SPEED_TEST_URL,
        dnsblZone = DNSBL_ZONE,
        socksTarget = SOCKS_PROBE_TARGET,
        resolve4 = resolveWithDns,
    } = targets;

    return {
        reachability: probeReachability,
        tcp: probeTcp,
        socks5: probeSocks5,
        socks4: (endpoint, timeout) => probeSocks4(endpoint, timeout, socksTarget),
        http: (endpoint, timeout) => probeHttp(endpoint, timeout, echo),
        https: (endpoint, timeout) => probeHttps(endpoint, timeout, httpsUrl, httpsAgentOptions),
        speed: (endpoint, timeout) => probeSpeed(endpoint, timeout, speedUrl),
        blacklist: (ip, timeout) => probeBlacklist(ip, timeout, dnsblZone, resolve4),
    };
}
