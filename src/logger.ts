import chalk, { ChalkFunction } from 'chalk';
import { inspect } from 'util';
import { errorMessage } from '~/utils';

export class Logger {
    protected static _chalk: chalk.Chalk = new chalk.Instance({ level: 1 });

    private readonly _location_value: string;

    protected get _location(): string {
        return this._location_value;
    }

    protected _previousLocations: string[];

    protected get _fullLocation(): string[] {
        return this._previousLocations.concat(this._location);
    }

    constructor(location: string, previousLocations: string[] = []) {
        this._location_value = location;
        this._previousLocations = previousLocations;
    }

    public createChild(location: string): Logger {
        return new Logger(location, this._fullLocation);
    }

    public createCounter(max: number): LoggerCounter {
        return new LoggerCounter(this._fullLocation, max);
    }

    public log(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages);
    }

    public error(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages, Logger._chalk.redBright);
    }

    public happy(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages, Logger._chalk.greenBright);
    }

    public warning(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages, Logger._chalk.yellow);
    }

    /**
     * "<step> failed: <reason>" as one colored line.
     * The reason is the text of a failed probe or a caught error.
     */
    public failure(step: string, reason: unknown, level: 'warning' | 'error' = 'warning'): void {
        const colorFn = level === 'error' ? Logger._chalk.redBright : Logger._chalk.yellow;

        Logger._log(this._fullLocation, [ `${ step } failed: ${ errorMessage(reason) }` ], colorFn);
    }

    public static format(locations: string | string[], messages: unknown[], colorFn?: ChalkFunction): string {
        const _messages = messages.map((m) => {
            let msg = typeof m === 'object' && m !== null
                ? inspect(m, { depth: 2 })
                : String(m);

            if (colorFn) {
                msg = colorFn(msg);
            }

            return msg;
        });

        let _location: string;

        if (typeof locations === 'string') _location = `[${ locations }]`;
        else {
            _location = locations.reduce((acc, item) => {
                return acc + `[${ item }]`;
            }, '');
        }

        return `${ _location }: ${ _messages.join(' ') }`;
    }

    protected static _log(locations: string | string[], messages: unknown[], colorFn?: ChalkFunction): void {
        console.log(Logger.format(locations, messages, colorFn));
    }
}

// Each message gets the next "n/max" location, used to follow the progress of a batch.
export class LoggerCounter extends Logger {
    private _count: number;
    private readonly _max: number;

    constructor(previousLocations: string[], max: number) {
        super('', previousLocations);

        this._count = 0;
        this._max = max;
    }

    protected override get _location() {
        return `${ ++this._count }/${ this._max }`;
    }
}
