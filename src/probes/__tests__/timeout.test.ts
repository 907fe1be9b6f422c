import { ProbeTimeoutError } from '~/proxy_checker/errors';
import { raceWithTimeout } from '~/probes/timeout';

describe('raceWithTimeout', () => {
    it('should settle with the operation when it is faster', async () => {
        await expect(raceWithTimeout(async () => 'done', 1000)).resolves.toBe('done');
    });

    it('should pass the operation error through', async () => {
        await expect(raceWithTimeout(async () => {
            throw new Error('connect ECONNREFUSED');
        }, 1000)).rejects.toThrow('connect ECONNREFUSED');
    });

    it('should reject a synchronous throw', async () => {
        await expect(raceWithTimeout(() => {
            throw new Error('bad input');
        }, 1000)).rejects.toThrow('bad input');
    });

    it('should reject and abort the operation when the timer wins', async () => {
        let signal: AbortSignal | undefined;
        const started = Date.now();

        await expect(raceWithTimeout((s) => {
            signal = s;

            return new Promise<never>(() => undefined);
        }, 100)).rejects.toBeInstanceOf(ProbeTimeoutError);

        expect(Date.now() - started).toBeLessThan(1000);
        expect(signal?.aborted).toBe(true);
    });

    it('should not abort an operation that finished in time', async () => {
        let signal: AbortSignal | undefined;

        await raceWithTimeout(async (s) => {
            signal = s;
        }, 50);
        await new Promise((resolve) => setTimeout(resolve, 80));

        expect(signal?.aborted).toBe(false);
    });
});
