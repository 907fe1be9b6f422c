import { env } from 'process';
import { Endpoint } from '~/types';

function numberFromEnv(value: string | undefined, fallback: number): number {
    const parsed = Number(value);

    return value && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const PORT = numberFromEnv(env.PORT, 3000);

// milliseconds, per probe
export const DEFAULT_TIMEOUT = numberFromEnv(env.DEFAULT_TIMEOUT, 5000);

// The number of simultaneously evaluated proxies.
export const DEFAULT_CONCURRENCY = numberFromEnv(env.DEFAULT_CONCURRENCY, 10);

// milliseconds
export const REAL_IP_CACHE_TTL = numberFromEnv(env.REAL_IP_CACHE_TTL, 1000 * 60 * 10);

// Must answer with { origin: string, headers: Record<string, string> }.
export const ECHO_URL = env.ECHO_URL || 'http://httpbin.org/get';

export const HTTPS_TEST_URL = env.HTTPS_TEST_URL || 'https://www.google.com/';

// The ip is appended to the url. Must answer with { country: string, as: string }.
export const GEOLOCATION_URL = env.GEOLOCATION_URL || 'http://ip-api.com/json/';

export const SPEED_TEST_URL = env.SPEED_TEST_URL || 'http://speedtest.tele2.net/1MB.zip';

export const DNSBL_ZONE = env.DNSBL_ZONE || 'zen.spamhaus.org';

// Only the handshake is checked, the proxy never has to reach this target.
export const SOCKS_PROBE_TARGET: Endpoint = { host: '8.8.8.8', port: 80 };
