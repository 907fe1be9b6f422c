import { AxiosProxyConfig } from 'axios';
import { isIPv4 } from 'net';
import { ParseError } from '~/proxy_checker/errors';
import { Endpoint } from '~/types';

const HOST_PATTERN = /^[A-Za-z0-9.-]+$/;
const BRACKETED_PATTERN = /^\[([0-9A-Fa-f:.]+)\]:(.*)$/;

/**
 * Decomposes "host:port" (or "[ipv6]:port") into an endpoint.
 * Never throws, a malformed address comes back as a ParseError.
 */
export function parseAddress(raw: string): Endpoint | ParseError {
    const input = raw.trim();

    let host: string;
    let port_string: string;

    const bracketed = input.match(BRACKETED_PATTERN);

    if (bracketed) {
        host = bracketed[1];
        port_string = bracketed[2];
    } else {
        const separator = input.lastIndexOf(':');

        if (separator === -1) return new ParseError(raw, 'missing port');

        host = input.slice(0, separator);
        port_string = input.slice(separator + 1);

        if (!host) return new ParseError(raw, 'missing host');
        if (!HOST_PATTERN.test(host)) return new ParseError(raw, 'invalid host');
    }

    if (!/^\d+$/.test(port_string)) return new ParseError(raw, 'port is not a number');

    const port = +port_string;

    if (port < 1 || port > 65535) return new ParseError(raw, 'port is out of range');

    return Object.freeze({ host, port });
}

export function formatEndpoint(endpoint: Endpoint): string {
    const host = endpoint.host.includes(':') ? `[${ endpoint.host }]` : endpoint.host;

    return `${ host }:${ endpoint.port }`;
}

export function parseEndpointToUrl(endpoint: Endpoint, protocol: 'http' | 'https' = 'http'): string {
    return `${ protocol }://${ formatEndpoint(endpoint) }`;
}

export function toAxiosProxyConfig(endpoint: Endpoint): AxiosProxyConfig {
    return {
        protocol: 'http',
        host: endpoint.host,
        port: endpoint.port,
    };
}

/**
 * Echo services report the forwarding chain as "client, proxy1, proxy2".
 * The last hop is the address that actually reached the service.
 */
export function extractOutgoingIp(origin: string): string | undefined {
    return origin
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .pop();
}

export function reverseIpv4(ip: string): string | undefined {
    if (!isIPv4(ip)) return undefined;

    return ip.split('.').reverse().join('.');
}

export function errorMessage(e: unknown): string {
    if (e instanceof Error) return e.message;

    return String(e);
}
