import { Cache } from '~/cache';

describe('Cache', () => {
    let now: number;
    const clock = () => now;

    beforeEach(() => {
        now = 1_000_000;
    });

    it('should start expired and empty', () => {
        const cache = new Cache<string>(1000, clock);

        expect(cache.isExpired).toBe(true);
        expect(cache.data).toBeNull();
    });

    it('should keep data until the ttl is over', () => {
        const cache = new Cache<string>(1000, clock);

        cache.update('198.51.100.7');
        now += 1000;
        expect(cache.data).toBe('198.51.100.7');

        now += 1;
        expect(cache.isExpired).toBe(true);
        expect(cache.data).toBeNull();
    });

    it('should share one load between concurrent callers', async () => {
        const cache = new Cache<string>(1000, clock);
        const load = jest.fn(async () => '198.51.100.7');

        const values = await Promise.all([ cache.getOrLoad(load), cache.getOrLoad(load), cache.getOrLoad(load) ]);

        expect(values).toEqual([ '198.51.100.7', '198.51.100.7', '198.51.100.7' ]);
        expect(load).toHaveBeenCalledTimes(1);

        await cache.getOrLoad(load);
        expect(load).toHaveBeenCalledTimes(1);
    });

    it('should load again once the value expired', async () => {
        const cache = new Cache<string>(1000, clock);
        const load = jest.fn(async () => '198.51.100.7');

        await cache.getOrLoad(load);
        now += 1001;
        await cache.getOrLoad(load);

        expect(load).toHaveBeenCalledTimes(2);
    });

    it('should not cache a failed load', async () => {
        const cache = new Cache<string>(1000, clock);
        const load = jest.fn<Promise<string>, []>()
        .mockRejectedValueOnce(new Error('echo unreachable'))
        .mockResolvedValueOnce('198.51.100.7');

        await expect(cache.getOrLoad(load)).rejects.toThrow('echo unreachable');
        await expect(cache.getOrLoad(load)).resolves.toBe('198.51.100.7');
        expect(load).toHaveBeenCalledTimes(2);
    });
});
