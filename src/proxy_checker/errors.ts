export type ParseErrorKind = 'Malformed';

export class ParseError extends Error {
    public readonly kind: ParseErrorKind = 'Malformed';

    constructor(public readonly input: string, reason: string) {
        super(`${ ParseError.name }: ${ reason } (${ JSON.stringify(input) })`);
    }
}

export class ProbeTimeoutError extends Error {
    constructor(timeout: number) {
        super(`${ ProbeTimeoutError.name }: no answer within ${ timeout }ms`);
    }
}

export class EchoFormatError extends Error {
    constructor(message: string) {
        super(`${ EchoFormatError.name }: ${ message }`);
    }
}

// Invalid request input, answered with 400.
export class InputError extends Error {
    constructor(message: string) {
        super(`${ InputError.name }: ${ message }`);
    }
}
