import { DEFAULT_CONCURRENCY } from '~/config';
import { Semaphore } from '~/limiter';
import { Logger } from '~/logger';
import { ParseError } from '~/proxy_checker/errors';
import { Endpoint } from '~/types';
import { errorMessage, formatEndpoint, parseAddress } from '~/utils';

export interface BatchRunnerOptions<R> {
    evaluate: (endpoint: Endpoint, timeout: number) => Promise<R>,

    // The record emitted for an address that is invalid or whose evaluation rejected.
    placeholder: (address: string, error: string) => R,

    // Short summary of a record for the progress log.
    describe?: (result: R) => string,
    logger?: Logger,
}

/**
 * Applies an evaluation to every address with at most `concurrency` evaluations in flight.
 * Results keep the input order, one per input address.
 */
export class BatchRunner<R> {
    private readonly _evaluate: (endpoint: Endpoint, timeout: number) => Promise<R>;
    private readonly _placeholder: (address: string, error: string) => R;
    private readonly _describe: (result: R) => string;
    private readonly _logger: Logger;

    constructor(options: BatchRunnerOptions<R>) {
        this._evaluate = options.evaluate;
        this._placeholder = options.placeholder;
        this._describe = options.describe ?? (() => 'done');
        this._logger = options.logger ?? new Logger('BatchRunner');
    }

    public async runAll(addresses: readonly string[], timeout: number, concurrency: number = DEFAULT_CONCURRENCY): Promise<R[]> {
        const limiter = new Semaphore(concurrency);
        const counter = this._logger.createCounter(addresses.length);

        const results: R[] = new Array(addresses.length);

        this._logger.log(`Checking ${ addresses.length } proxies, ${ concurrency } at a time...`);

        await Promise.all(addresses.map(async (raw, index) => {
            const parsed = parseAddress(raw);

            if (parsed instanceof ParseError) {
                counter.warning(parsed.message);
                results[index] = this._placeholder(raw, parsed.message);

                return;
            }

            const address = formatEndpoint(parsed);

            try {
                const result = await limiter.use(() => this._evaluate(parsed, timeout));

                counter.log(address, this._describe(result));
                results[index] = result;
            } catch (e) {
                counter.error(address, errorMessage(e));
                results[index] = this._placeholder(address, errorMessage(e));
            }
        }));

        return results;
    }
}
