export interface Endpoint {
    readonly host: string,
    readonly port: number,
}

export type ProxyType = 'HTTP' | 'HTTPS' | 'SOCKS4' | 'SOCKS5' | 'Unknown';

export type Anonymity = 'Elite' | 'Anonymous' | 'Transparent' | 'Unknown';

export interface ProxyInfo {
    // canonical "host:port"
    address: string,
    type: ProxyType,
    anonymity: Anonymity,
    country?: string,
    asn?: string,
    outgoingIp?: string,
    isAlive: boolean,

    // Comma separated names of the headers injected by the proxy.
    additionalHeaders?: string,

    // -1 when not measured
    latencyMs: number,

    // -1 when not measured
    downloadSpeedKBps: number,

    // 0 - 100
    score: number,
    isBlacklisted: boolean,

    // Set on placeholder records, e.g. when the address could not be parsed.
    error?: string,
}

export interface BaselineResult {
    address: string,
    reachable: boolean,
    pingMs?: number,
    tcpOpen: boolean,
    httpAlive: boolean,
    error?: string,
}
