import { ProxyInfo } from '~/types';

export function createDeadProxyInfo(address: string, error?: string): Readonly<ProxyInfo> {
    const info: ProxyInfo = {
        address,
        type: 'Unknown',
        anonymity: 'Unknown',
        isAlive: false,
        latencyMs: -1,
        downloadSpeedKBps: -1,
        score: 0,
        isBlacklisted: false,
    };

    if (error) info.error = error;

    return Object.freeze(info);
}
