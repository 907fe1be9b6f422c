import { Anonymity } from '~/types';

// Sent by the checker itself or added by the echo service, never by the proxy.
const EXPECTED_HEADERS = new Set([
    'host',
    'accept',
    'accept-encoding',
    'user-agent',
    'connection',
    'content-length',
    'x-amzn-trace-id',
]);

export function findHeader(headers: Record<string, string>, name: string): string | undefined {
    const lower = name.toLowerCase();
    const key = Object.keys(headers).find((k) => k.toLowerCase() === lower);

    return key === undefined ? undefined : headers[key];
}

/**
 * Elite: no forwarding header at all.
 * Transparent: X-Forwarded-For carries our real ip.
 * Anonymous: forwarding headers without our ip, or our ip is unknown.
 */
export function classifyAnonymity(headers: Record<string, string>, realIp?: string): Anonymity {
    const forwarded_for = findHeader(headers, 'X-Forwarded-For');
    const via = findHeader(headers, 'Via');

    if (forwarded_for === undefined && via === undefined) return 'Elite';

    const forwarded_ips = (forwarded_for ?? '').split(',').map((ip) => ip.trim());

    if (realIp && forwarded_ips.includes(realIp)) return 'Transparent';

    return 'Anonymous';
}

export function findInjectedHeaders(headers: Record<string, string>): string | undefined {
    const injected = Object.keys(headers).filter((name) => !EXPECTED_HEADERS.has(name.toLowerCase()));

    return injected.length ? injected.join(', ') : undefined;
}
