/**
 * Counting semaphore. Waiters are served in arrival order.
 */
export class Semaphore {
    private readonly _capacity: number;
    private _active: number = 0;
    private _waiting: Array<() => void> = [];

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`capacity must be a positive integer, got ${ capacity }`);
        }

        this._capacity = capacity;
    }

    public get capacity(): number {
        return this._capacity;
    }

    public get active(): number {
        return this._active;
    }

    public get pending(): number {
        return this._waiting.length;
    }

    public acquire(): Promise<void> {
        if (this._active < this._capacity) {
            this._active++;
            return Promise.resolve();
        }

        return new Promise((resolve) => {
            this._waiting.push(resolve);
        });
    }

    public release(): void {
        const next = this._waiting.shift();

        // The slot passes straight to the next waiter, the active count stays the same.
        if (next) next();
        else if (this._active > 0) this._active--;
    }

    public async use<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();

        try {
            return await task();
        } finally {
            this.release();
        }
    }
}
