import { GeoInfo, GeoLocator } from '~/geolocation';
import { Logger } from '~/logger';
import { ProbeResult, ProbeSet } from '~/probes';
import { classifyAnonymity, findInjectedHeaders } from '~/proxy_checker/anonymity';
import { calculateScore } from '~/proxy_checker/score';
import { createDeadProxyInfo } from '~/proxy_checker/types';
import { BaselineResult, Endpoint, ProxyInfo, ProxyType } from '~/types';
import { extractOutgoingIp, formatEndpoint } from '~/utils';

export interface ProxyEvaluatorOptions {
    probes: ProbeSet,
    geolocation: GeoLocator,

    // The address of this machine as the echo service sees it without a proxy.
    realIp: () => Promise<string | undefined>,
    logger?: Logger,
}

type TypeProbe = (endpoint: Endpoint, timeout: number) => Promise<ProbeResult<unknown>>;

export class ProxyEvaluator {
    private readonly _probes: ProbeSet;
    private readonly _geolocation: GeoLocator;
    private readonly _realIp: () => Promise<string | undefined>;
    private readonly _logger: Logger;

    constructor(options: ProxyEvaluatorOptions) {
        this._probes = options.probes;
        this._geolocation = options.geolocation;
        this._realIp = options.realIp;
        this._logger = options.logger ?? new Logger('ProxyEvaluator');
    }

    /**
     * Never rejects. Past the liveness check every step degrades only its own fields.
     */
    public async evaluate(endpoint: Endpoint, timeout: number): Promise<Readonly<ProxyInfo>> {
        const address = formatEndpoint(endpoint);
        const logger = this._logger.createChild(address);

        const echo = await this._probes.http(endpoint, timeout);

        if (!echo.success) {
            logger.failure('http check', echo.reason, 'error');

            return createDeadProxyInfo(address);
        }

        const info: ProxyInfo = {
            address,
            type: 'HTTP',
            anonymity: 'Unknown',
            isAlive: true,
            latencyMs: -1,
            downloadSpeedKBps: -1,
            score: 0,
            isBlacklisted: false,
        };

        const { headers, origin } = echo.payload;
        const outgoing_ip = extractOutgoingIp(origin);

        if (outgoing_ip) {
            info.outgoingIp = outgoing_ip;

            const geo = await this._step<GeoInfo | null>(logger, 'geolocation', null, () => {
                return this._geolocation.lookup(outgoing_ip, timeout);
            });

            if (geo?.country) info.country = geo.country;
            if (geo?.asn) info.asn = geo.asn;
        }

        info.type = await this._step<ProxyType>(logger, 'type detection', 'HTTP', () => this.detectType(endpoint, timeout));

        const real_ip = await this._step<string | undefined>(logger, 'real ip', undefined, this._realIp);
        info.anonymity = classifyAnonymity(headers, real_ip);

        const injected = findInjectedHeaders(headers);
        if (injected) info.additionalHeaders = injected;

        const speed = await this._probes.speed(endpoint, timeout);

        if (speed.success) {
            info.latencyMs = speed.payload.latencyMs;
            info.downloadSpeedKBps = speed.payload.downloadSpeedKBps;
        } else {
            logger.failure('speed test', speed.reason);
        }

        info.score = calculateScore(info);

        if (outgoing_ip) {
            info.isBlacklisted = await this._step<boolean>(logger, 'blacklist', false, async () => {
                return (await this._probes.blacklist(outgoing_ip, timeout)).success;
            });
        }

        logger.happy(`${ info.type } ${ info.anonymity }, score ${ info.score }`);

        return Object.freeze(info);
    }

    /**
     * SOCKS5 > SOCKS4 > HTTPS, the first accepted handshake wins.
     * An alive proxy that passes none of them is a plain HTTP proxy.
     */
    public async detectType(endpoint: Endpoint, timeout: number): Promise<ProxyType> {
        const candidates: Array<[ ProxyType, TypeProbe ]> = [
            [ 'SOCKS5', (e, t) => this._probes.socks5(e, t) ],
            [ 'SOCKS4', (e, t) => this._probes.socks4(e, t) ],
            [ 'HTTPS', (e, t) => this._probes.https(e, t) ],
        ];

        for (const [ type, probe ] of candidates) {
            const result = await probe(endpoint, timeout);

            if (result.success) return type;
        }

        return 'HTTP';
    }

    // Reachability, tcp connect and the http check side by side.
    public async checkBaseline(endpoint: Endpoint, timeout: number): Promise<Readonly<BaselineResult>> {
        const [ reachability, tcp, http ] = await Promise.all([
            this._probes.reachability(endpoint, timeout),
            this._probes.tcp(endpoint, timeout),
            this._probes.http(endpoint, timeout),
        ]);

        const result: BaselineResult = {
            address: formatEndpoint(endpoint),
            reachable: reachability.success,
            tcpOpen: tcp.success,
            httpAlive: http.success,
        };

        if (reachability.success && reachability.payload.timeMs !== undefined) {
            result.pingMs = reachability.payload.timeMs;
        }

        return Object.freeze(result);
    }

    private async _step<T>(logger: Logger, name: string, fallback: T, step: () => Promise<T>): Promise<T> {
        try {
            return await step();
        } catch (e) {
            logger.failure(name, e);

            return fallback;
        }
    }
}
