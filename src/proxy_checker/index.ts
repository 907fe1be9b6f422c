import { RequestHandler } from 'express';
import { Cache } from '~/cache';
import { DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT, REAL_IP_CACHE_TTL } from '~/config';
import { Echo } from '~/echo/Echo';
import { HttpbinEcho } from '~/echo/httpbin.echo';
import { GeoLocator, IpApiGeolocation } from '~/geolocation';
import { Logger } from '~/logger';
import { createProbeSet, ProbeSet } from '~/probes';
import { BatchRunner } from '~/proxy_checker/batch.runner';
import { InputError } from '~/proxy_checker/errors';
import { ProxyEvaluator } from '~/proxy_checker/evaluator';
import { createDeadProxyInfo } from '~/proxy_checker/types';
import { AddEndpointInterface, ServerError } from '~/server/types';
import { BaselineResult, ProxyInfo } from '~/types';
import { errorMessage, extractOutgoingIp } from '~/utils';

export interface ProxyCheckerOptions {
    echo?: Echo,
    probes?: ProbeSet,
    geolocation?: GeoLocator,

    // milliseconds
    realIpCacheTtl?: number,
    defaultTimeout?: number,
    defaultConcurrency?: number,
}

interface CheckRequest {
    addresses: string[],
    timeout: number,
    concurrency: number,
}

export class ProxyChecker {
    private readonly _logger: Logger;
    private readonly _echo: Echo;
    private readonly _realIpCache: Cache<string>;
    private readonly _evaluator: ProxyEvaluator;
    private readonly _runner: BatchRunner<Readonly<ProxyInfo>>;
    private readonly _baselineRunner: BatchRunner<Readonly<BaselineResult>>;
    private readonly _defaultTimeout: number;
    private readonly _defaultConcurrency: number;

    constructor(options: ProxyCheckerOptions = {}) {
        this._logger = new Logger('ProxyChecker');
        this._echo = options.echo ?? new HttpbinEcho();
        this._realIpCache = new Cache<string>(options.realIpCacheTtl ?? REAL_IP_CACHE_TTL);
        this._defaultTimeout = options.defaultTimeout ?? DEFAULT_TIMEOUT;
        this._defaultConcurrency = options.defaultConcurrency ?? DEFAULT_CONCURRENCY;

        this._evaluator = new ProxyEvaluator({
            probes: options.probes ?? createProbeSet({ echo: this._echo }),
            geolocation: options.geolocation ?? new IpApiGeolocation(),
            realIp: () => this.getRealIp(),
            logger: this._logger.createChild('evaluate'),
        });

        this._runner = new BatchRunner<Readonly<ProxyInfo>>({
            evaluate: (endpoint, timeout) => this._evaluator.evaluate(endpoint, timeout),
            placeholder: (address, error) => createDeadProxyInfo(address, error),
            describe: (info) => info.isAlive ? `alive, score ${ info.score }` : 'dead',
            logger: this._logger.createChild('check'),
        });

        this._baselineRunner = new BatchRunner<Readonly<BaselineResult>>({
            evaluate: (endpoint, timeout) => this._evaluator.checkBaseline(endpoint, timeout),
            placeholder: (address, error) => Object.freeze({
                address,
                reachable: false,
                tcpOpen: false,
                httpAlive: false,
                error,
            }),
            describe: (r) => `ping ${ r.reachable }, tcp ${ r.tcpOpen }, http ${ r.httpAlive }`,
            logger: this._logger.createChild('baseline'),
        });
    }

    public check(addresses: readonly string[], timeout?: number, concurrency?: number): Promise<Readonly<ProxyInfo>[]> {
        return this._runner.runAll(
            addresses,
            timeout ?? this._defaultTimeout,
            concurrency ?? this._defaultConcurrency,
        );
    }

    public checkBaseline(addresses: readonly string[], timeout?: number, concurrency?: number): Promise<Readonly<BaselineResult>[]> {
        return this._baselineRunner.runAll(
            addresses,
            timeout ?? this._defaultTimeout,
            concurrency ?? this._defaultConcurrency,
        );
    }

    // The address of this machine as seen by the echo service. Cached, one lookup at a time.
    public getRealIp(): Promise<string> {
        return this._realIpCache.getOrLoad(async () => {
            const echo = await this._echo.byHttp({
                proxy: false,
                timeout: this._defaultTimeout,
            });

            const ip = extractOutgoingIp(echo.origin);

            if (!ip) throw new Error(`echo service reported no origin: "${ echo.origin }"`);

            this._logger.log(`Current ip is ${ ip }`);

            return ip;
        });
    }

    public getEndpoints(): AddEndpointInterface[] {
        return [
            {
                path: '/check',
                method: 'post',
                handler: this._checkEndpointHandler,
            }, {
                path: '/check/basic',
                method: 'post',
                handler: this._checkBasicEndpointHandler,
            },
        ];
    }

    private _checkEndpointHandler: RequestHandler<{}, Readonly<ProxyInfo>[] | ServerError, unknown> = async (req, res) => {
        res.appendHeader('content-type', 'application/json');

        try {
            const { addresses, timeout, concurrency } = this._parseCheckRequest(req.body, req.query);
            const result = await this.check(addresses, timeout, concurrency);

            res.status(200);
            res.send(result);

        } catch (e) {
            this._sendError(res, e);
        }
    };

    private _checkBasicEndpointHandler: RequestHandler<{}, Readonly<BaselineResult>[] | ServerError, unknown> = async (req, res) => {
        res.appendHeader('content-type', 'application/json');

        try {
            const { addresses, timeout, concurrency } = this._parseCheckRequest(req.body, req.query);
            const result = await this.checkBaseline(addresses, timeout, concurrency);

            res.status(200);
            res.send(result);

        } catch (e) {
            this._sendError(res, e);
        }
    };

    private _sendError(res: { status(code: number): unknown, send(body: ServerError): unknown }, e: unknown): void {
        if (e instanceof InputError) {
            res.status(400);
        } else {
            this._logger.failure('check', e, 'error');
            res.status(500);
        }

        res.send({ msg: errorMessage(e) });
    }

    private _parseCheckRequest(body: unknown, query: Record<string, unknown>): CheckRequest {
        if (!Array.isArray(body) || !body.length) {
            throw new InputError('body must be a non-empty array of "host:port" strings');
        }

        const addresses: string[] = [];

        for (const item of body) {
            if (typeof item !== 'string') throw new InputError('every address must be a string');
            addresses.push(item);
        }

        return {
            addresses,
            timeout: ProxyChecker._positiveInteger(query.timeout, 'timeout', this._defaultTimeout),
            concurrency: ProxyChecker._positiveInteger(query.concurrency, 'concurrency', this._defaultConcurrency),
        };
    }

    private static _positiveInteger(value: unknown, name: string, fallback: number): number {
        if (value === undefined) return fallback;

        const parsed = typeof value === 'string' && /^\d+$/.test(value) ? +value : NaN;

        if (!Number.isSafeInteger(parsed) || parsed < 1) {
            throw new InputError(`${ name } must be a positive integer`);
        }

        return parsed;
    }
}
