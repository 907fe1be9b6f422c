export class Cache<T> {
    // milliseconds
    private readonly _ttl: number;
    private _lastUpdate: number = 0;
    private _data: T | null = null;
    private _loading: Promise<T> | null = null;

    /**
     * @param {number} ttl - milliseconds
     * @param {() => number} now - clock, replaced in tests
     */
    constructor(ttl: number, private readonly _now: () => number = Date.now) {
        this._ttl = ttl;
    }

    public get isExpired(): boolean {
        return this._now() - this._lastUpdate > this._ttl;
    }

    public get data(): T | null {
        if (this.isExpired) {
            this._data = null;
        }

        return this._data;
    }

    public update(data: T): void {
        this._data = data;
        this._lastUpdate = this._now();
    }

    // Returns the cached value or loads, stores and returns a fresh one.
    // Concurrent callers share one load. A failed load is not cached.
    public getOrLoad(load: () => Promise<T>): Promise<T> {
        const cached = this.data;

        if (cached !== null) return Promise.resolve(cached);

        if (!this._loading) {
            this._loading = load()
            .then((fresh) => {
                this.update(fresh);

                return fresh;
            })
            .finally(() => {
                this._loading = null;
            });
        }

        return this._loading;
    }
}
